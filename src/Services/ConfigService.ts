import Joi from 'joi';
import { join, resolve } from 'path';
import { LoadConfig } from '../Config.js';
import { Configurator } from '../Common/Configurator.js';
import { ErrorMessage, InvalidArgumentError } from '../Common/Errors.js';
import type { ConfigLogLevel } from '../Common/Log.js';
import { EVENT_NAMES } from '../Domain/index.js';
import { MAIN_EVENT_BUS, MainEventBus } from '../Events/MainEventBus.js';
import type { ValidatedConfig } from '../Types/Config.js';

/** Config document after Joi defaults, before path resolution. */
interface ConfigDocument {
    dataRoot: string;
    projectsDir?: string;
    indexFile?: string;
    recordExtension: string;
    logLevel: ConfigLogLevel;
}

// Treat null as empty and default to {}; unknown keys are tolerated for forward compatibility
const configSchema = Joi.object<ConfigDocument>({
    dataRoot: Joi.string().min(1).default(`./data`),
    projectsDir: Joi.string().min(1),
    indexFile: Joi.string().min(1),
    recordExtension: Joi.string()
        .pattern(/^\.[A-Za-z0-9]+$/)
        .default(`.json`),
    logLevel: Joi.string().valid(`debug`, `info`, `warn`, `error`).default(`info`),
})
    .unknown(true)
    .empty(null)
    .default({});

/**
 * Service responsible for loading and validating application configuration.
 */
export class ConfigService {
    /** Event bus for emitting config-related events */
    private _eventBus: MainEventBus;
    private _env: NodeJS.ProcessEnv;
    private _configurator: Configurator<ConfigDocument> | null = null;
    private _path: string | null = null; // file the current config came from

    /**
     * Constructs a ConfigService.
     * @param eventBus MainEventBus - Event bus used for emitting `config.loaded` / `config.error`.
     * @param env NodeJS.ProcessEnv - Environment holding PRINT_LEDGER_* overrides.
     */
    constructor(eventBus: MainEventBus = MAIN_EVENT_BUS, env: NodeJS.ProcessEnv = process.env) {
        this._eventBus = eventBus;
        this._env = env;
    }

    /**
     * Loads and validates the configuration from a JSON or YAML file.
     * @param path string - Filesystem path to the config file. Example: './config/config.yaml'
     * @returns Promise<ValidatedConfig> - The validated config with absolute paths.
     * @throws InvalidArgumentError if validation fails, SerializationError if the file is unreadable
     * @example
     * const configService = new ConfigService(eventBus);
     * const config = await configService.Load('./config/config.yaml');
     */
    public async Load(path: string): Promise<ValidatedConfig> {
        const rawConfig = await LoadConfig(path, this._env, this._eventBus);
        let document: ConfigDocument;
        try {
            let configurator = this._configurator;
            if (configurator) {
                configurator.updateConfig(rawConfig);
            } else {
                configurator = new Configurator(configSchema, rawConfig);
            }
            this._configurator = configurator;
            document = configurator.getConfig();
        } catch(err) {
            const error = new InvalidArgumentError(`Config validation error in '${path}': ${ErrorMessage(err)}`, {
                path,
            });
            this._eventBus.Emit(EVENT_NAMES.configError, { path, error });
            throw error;
        }
        this._path = path;
        const validated = ResolveConfig(document);
        this._eventBus.Emit(EVENT_NAMES.configLoaded, validated);
        return validated;
    }

    /**
     * Re-reads the file given to the last successful `Load`. On failure the previous config stays active.
     * @throws InvalidArgumentError when nothing was loaded yet
     */
    public async Reload(): Promise<ValidatedConfig> {
        if (!this._path) {
            throw new InvalidArgumentError(`No config has been loaded yet`);
        }
        return this.Load(this._path);
    }

    /** Active validated config, or null before the first `Load`. */
    public Current(): ValidatedConfig | null {
        return this._configurator ? ResolveConfig(this._configurator.getConfig()) : null;
    }
}

/** Resolves every path against the working directory and derives the defaults under dataRoot. */
function ResolveConfig(document: ConfigDocument): ValidatedConfig {
    const dataRoot = resolve(document.dataRoot);
    return {
        dataRoot,
        projectsDir: resolve(document.projectsDir ?? join(dataRoot, `projects`)),
        indexFile: resolve(document.indexFile ?? join(dataRoot, `project_index.json`)),
        recordExtension: document.recordExtension,
        logLevel: document.logLevel,
    };
}
