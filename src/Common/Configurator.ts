import type { ObjectSchema, ValidationOptions } from 'joi';

/**
 * Configurator validates and stores configuration using a Joi schema.
 * @template T - The expected shape of the configuration object
 */
export class Configurator<T> {
    /** Joi schema used for validation */
    private readonly _schema: ObjectSchema<T>;
    private readonly _options: ValidationOptions;
    /** Stored, validated configuration object */
    private _config: T;

    /**
     * Creates a Configurator.
     * @param schema ObjectSchema<T> - Joi schema for validating the configuration
     * @param rawConfig unknown - Raw configuration object to validate
     * @param options ValidationOptions - Joi options applied to every validation
     * @throws Throws a Joi.ValidationError if validation fails
     * @example
     * const schema = Joi.object({ dataRoot: Joi.string().default('./data') });
     * const configurator = new Configurator(schema, {});
     */
    constructor(schema: ObjectSchema<T>, rawConfig: unknown, options: ValidationOptions = {}) {
        this._schema = schema;
        this._options = options;
        this._config = this.__validate(rawConfig);
    }

    private __validate(rawConfig: unknown): T {
        const { error, value } = this._schema.validate(rawConfig, this._options);

        if (error) {
            throw error;
        }
        return value;
    }

    /**
     * Retrieves the stored configuration.
     */
    public getConfig(): T {
        return this._config;
    }

    /**
     * Replaces the configuration after validating it; the previous one is kept when validation fails.
     * @throws Throws a Joi.ValidationError if validation fails
     */
    public updateConfig(rawConfig: unknown): void {
        this._config = this.__validate(rawConfig);
    }
}
