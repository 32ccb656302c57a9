/**
 * Boot wiring: config -> log threshold -> paths -> repositories -> store.
 */
import { log, SetLogThreshold } from './Common/Log.js';
import { MAIN_EVENT_BUS, MainEventBus } from './Events/MainEventBus.js';
import { ConfigService } from './Services/ConfigService.js';
import { PathManager } from './Services/PathManager.js';
import { ProjectStore } from './Services/ProjectStore.js';
import { ProjectFileRepository } from './Repository/ProjectFileRepository.js';
import { ProjectIndex } from './Repository/ProjectIndex.js';
import type { VolumeEstimator } from './Project/VolumeEstimator.js';
import type { ValidatedConfig } from './Types/Config.js';

const SOURCE = 'App';

/** Default config location, relative to the working directory. */
export const DEFAULT_CONFIG_PATH = `./config/config.yaml`;

export interface BootOptions {
    eventBus?: MainEventBus;
    env?: NodeJS.ProcessEnv;
    volumeEstimator?: VolumeEstimator;
}

export interface BootedLedger {
    config: ValidatedConfig;
    store: ProjectStore;
}

/**
 * Loads configuration and returns a ready store with its index loaded.
 * @param configPath string - Config file; defaults to CONFIG_PATH or ./config/config.yaml
 * @example
 * const { store } = await BootProjectStore();
 * const result = await store.ListIds();
 */
export async function BootProjectStore(configPath?: string, options: BootOptions = {}): Promise<BootedLedger> {
    const env = options.env ?? process.env;
    const eventBus = options.eventBus ?? MAIN_EVENT_BUS;
    const path = configPath ?? env.CONFIG_PATH ?? DEFAULT_CONFIG_PATH;

    const config = await new ConfigService(eventBus, env).Load(path);
    SetLogThreshold(config.logLevel);

    const paths = new PathManager(config);
    const store = new ProjectStore({
        records: new ProjectFileRepository(paths.ProjectsDir()),
        index: new ProjectIndex(paths.IndexFile()),
        recordExtension: config.recordExtension,
        volumeEstimator: options.volumeEstimator,
        eventBus,
    });
    await store.Init();

    log.info(`Project ledger ready at ${config.dataRoot}`, SOURCE, `Boot`);
    return { config, store };
}
