/**
 * Generic config file reader, not tied to the application event bus or any specific runtime.
 */
import { readFile } from 'fs/promises';

/**
 * Loads and parses a config file (JSON or YAML). Does not emit any application events.
 * @param configPath string - Path to config file (e.g. './config/config.yaml')
 * @returns Promise<unknown> - Parsed document, unvalidated
 * @throws Error if file cannot be read or parsed
 * @example
 * import { readConfigFile } from './Common/ConfigReader.js';
 * const raw = await readConfigFile('./config/config.yaml');
 */
export async function readConfigFile(configPath: string): Promise<unknown> {
    const raw = await readFile(configPath, 'utf-8');

    if (configPath.endsWith('.json')) {
        return JSON.parse(raw);
    }
    if (configPath.endsWith('.yaml') || configPath.endsWith('.yml')) {
        // Lazy-load yaml parser only if needed
        const yaml = await import('js-yaml');
        return yaml.load(raw);
    }
    throw new Error('Unsupported config file format. Use .json or .yaml');
}
