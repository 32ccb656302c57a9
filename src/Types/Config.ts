import type { ConfigLogLevel } from '../Common/Log.js';

/**
 * Validated configuration shape used across services. All paths are absolute.
 */
export interface ValidatedConfig {
    dataRoot: string;
    projectsDir: string;
    indexFile: string;
    recordExtension: string;
    logLevel: ConfigLogLevel;
}
