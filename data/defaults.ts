// ============================================================================
// TeamCity Distribution Layout & Configuration Defaults
// ============================================================================

export const DEFAULT_SOURCE_URL = 'http://download.jetbrains.com/teamcity';
export const DEFAULT_SERVERS_DIR = 'servers';
export const DEFAULT_DATA_DIRECTORY = '.datadir';
export const DEFAULT_BUILD_DIRECTORY = 'target';
export const DEFAULT_START_AGENT = true;
export const DEFAULT_DOWNLOAD_QUIETLY = false;

/**
 * Launcher probed to decide whether a directory looks like a TeamCity installation.
 * Always the POSIX script, on every host.
 */
export const MARKER_SCRIPT = 'bin/runAll.sh';

export const VERSION_ARCHIVE = 'webapps/ROOT/WEB-INF/lib/common-api.jar';
export const VERSION_ENTRY = 'serverVersion.properties.xml';
export const VERSION_PROPERTY = 'Display_Version';

export const AGENT_LAUNCHER = 'runAll';
export const SERVER_LAUNCHER = 'teamcity-server';

export const PLUGINS_DIR = 'plugins';
export const DATA_PATH_ENV = 'TEAMCITY_DATA_PATH';

/**
 * How long the output drain keeps reading after the process exited
 * before it gives up on a pipe held open by a background child.
 */
export const DRAIN_GRACE_MS = 2000;
