// src/config/index.ts
import { ConfigurationError } from '../core/common/errors';

// --- Interfaces ---

type NodeEnv = 'development' | 'production' | 'test';
type LogLevel = 'error' | 'warn' | 'info' | 'http' | 'verbose' | 'debug' | 'silly';

// Fixed rule policy. Not overridable from the environment: rule sets are not configurable.
interface ValidationPolicy {
    /** Upper-cased spellings accepted by the gender rule */
    readonly acceptedGenders: readonly string[];
    /** Appended after every failure description, including the last one */
    readonly descriptionSeparator: string;
    /** Rows of each partition returned in the HTTP response */
    readonly sampleSize: number;
}

interface UploadConfig {
    readonly maxFileSizeBytes: number;
}

// Define the structure of our main application configuration
interface AppConfig {
    readonly nodeEnv: NodeEnv;
    readonly port: number;
    readonly logLevel: LogLevel;
    readonly upload: UploadConfig;
    readonly validation: ValidationPolicy;
}

// --- Helper Functions ---
function parseIntEnv(varName: string, defaultValue?: number): number {
    const valueStr = process.env[varName];
    if (valueStr) {
        const valueInt = parseInt(valueStr, 10);
        if (!isNaN(valueInt)) {
            return valueInt;
        }
        throw new ConfigurationError(`Invalid integer format for environment variable ${varName}: ${valueStr}`);
    }
    if (defaultValue !== undefined) {
        return defaultValue;
    }
    throw new ConfigurationError(`Missing required environment variable: ${varName}`);
}

const validNodeEnvs: readonly NodeEnv[] = ['development', 'production', 'test'];
const validLogLevels: readonly LogLevel[] = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'];

function isNodeEnv(value: string | undefined): value is NodeEnv {
    return validNodeEnvs.some(env => env === value);
}

function isLogLevel(value: string | undefined): value is LogLevel {
    return validLogLevels.some(level => level === value);
}

function resolveLogLevel(): LogLevel {
    const raw = process.env.LOG_LEVEL;
    if (raw === undefined || raw === '') return 'info';
    if (isLogLevel(raw)) return raw;
    // Logger depends on this value, so console is the only channel here
    console.warn(`Invalid LOG_LEVEL: ${raw}. Defaulting to 'info'.`);
    return 'info';
}

const rawNodeEnv = process.env.NODE_ENV;

// --- Load, Validate, and Export Configuration ---
const config: AppConfig = {
    nodeEnv: isNodeEnv(rawNodeEnv) ? rawNodeEnv : 'development',
    port: parseIntEnv('APP_PORT', 3000),
    logLevel: resolveLogLevel(),

    upload: {
        maxFileSizeBytes: parseIntEnv('UPLOAD_MAX_FILE_SIZE_MB', 20) * 1024 * 1024,
    },

    validation: {
        acceptedGenders: Object.freeze([
            'LAKI-LAKI',
            'LAKI LAKI',
            'LAKI - LAKI',
            'LAKI- LAKI',
            'LAKI -LAKI',
            'PEREMPUAN',
        ]),
        descriptionSeparator: '; ',
        sampleSize: parseIntEnv('VALIDATION_SAMPLE_SIZE', 10),
    },
};

// --- Validation ---
if (config.validation.sampleSize < 0) {
    throw new ConfigurationError(`VALIDATION_SAMPLE_SIZE must not be negative: ${config.validation.sampleSize}`);
}
if (config.upload.maxFileSizeBytes <= 0) {
    throw new ConfigurationError('UPLOAD_MAX_FILE_SIZE_MB must be positive.');
}

// --- Freeze Configuration ---
Object.freeze(config);
Object.freeze(config.upload);
Object.freeze(config.validation);

export type { AppConfig, LogLevel, NodeEnv, ValidationPolicy };

// --- Export ---
export default config;
