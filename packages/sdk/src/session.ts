/**
 * Well-known name of the session that hosts the process supervisor.
 * Reusing one name keeps repeated bootstraps on a single session.
 */
export const SUPERVISORD_SESSION_ID = "supervisord-session"

export const SUPERVISORD_CONFIG_PATH = "/etc/supervisor/conf.d/supervisord.conf"

export const SUPERVISORD_COMMAND = `exec /usr/bin/supervisord -n -c ${SUPERVISORD_CONFIG_PATH}`
