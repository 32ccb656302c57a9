/**
 * Loads the raw configuration document from a JSON or YAML file and applies environment overrides.
 * Validation happens in ConfigService.
 */

import { readConfigFile } from './Common/ConfigReader.js';
import { ErrorMessage, IsErrnoCode, SerializationError, ToAppError } from './Common/Errors.js';
import { log } from './Common/Log.js';
import { EVENT_NAMES } from './Domain/index.js';
import { MAIN_EVENT_BUS, MainEventBus } from './Events/MainEventBus.js';

/** Unvalidated configuration document. */
export type RawConfig = Record<string, unknown>;

/** Environment variables that override config keys (highest precedence). */
export const ENV_OVERRIDES = {
    PRINT_LEDGER_DATA_ROOT: `dataRoot`,
    PRINT_LEDGER_PROJECTS_DIR: `projectsDir`,
    PRINT_LEDGER_INDEX_FILE: `indexFile`,
    PRINT_LEDGER_LOG_LEVEL: `logLevel`,
} as const;

function IsRecord(value: unknown): value is RawConfig {
    return typeof value === `object` && value !== null && !Array.isArray(value);
}

/**
 * Reads the config file and merges environment overrides into it.
 * A missing file counts as an empty document, so defaults and env vars alone are enough to run.
 * @param configPath string - Path to configuration file (JSON or YAML format)
 * @param env NodeJS.ProcessEnv - Environment to read overrides from
 * @param eventBus MainEventBus - Receives `config.error` on failure
 * @throws SerializationError when the file cannot be read or parsed, or is not a mapping
 * @example
 * const raw = await LoadConfig('./config/config.yaml');
 */
export async function LoadConfig(
    configPath: string,
    env: NodeJS.ProcessEnv = process.env,
    eventBus: MainEventBus = MAIN_EVENT_BUS,
): Promise<RawConfig> {
    try {
        const parsedConfig = await __readDocument(configPath);
        for (const [variable, key] of Object.entries(ENV_OVERRIDES)) {
            const override = env[variable];
            if (override) {
                parsedConfig[key] = override;
            }
        }
        return parsedConfig;
    } catch(configError) {
        eventBus.Emit(EVENT_NAMES.configError, { path: configPath, error: ToAppError(configError) });
        throw configError;
    }
}

async function __readDocument(configPath: string): Promise<RawConfig> {
    let document: unknown;
    try {
        document = await readConfigFile(configPath);
    } catch(error) {
        if (IsErrnoCode(error, `ENOENT`)) {
            log.info(`Config file ${configPath} not found, using defaults`, `Config`);
            return {};
        }
        throw new SerializationError(`Failed to read config ${configPath}: ${ErrorMessage(error)}`, { configPath }, error);
    }
    if (document === null || document === undefined) {
        return {};
    }
    if (!IsRecord(document)) {
        throw new SerializationError(`Config ${configPath} must be a mapping of keys to values`, { configPath });
    }
    return { ...document };
}
