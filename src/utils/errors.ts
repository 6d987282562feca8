/** Base class of the fatal errors raised at the tool's outer boundary. */
export class ModuleLocatorError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/** module-info.json is missing, unreadable or not a JSON object. */
export class ModuleInfoError extends ModuleLocatorError {
    readonly filePath: string;

    constructor(message: string, filePath: string, options?: { cause?: unknown }) {
        super(`${message} (${filePath})`, options);
        this.filePath = filePath;
    }
}

/** A configuration value has the wrong type or an unknown value. */
export class ConfigError extends ModuleLocatorError {
    readonly key: string;

    constructor(key: string, message: string) {
        super(`Invalid setting "${key}": ${message}`);
        this.key = key;
    }
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
