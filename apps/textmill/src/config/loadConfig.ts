/**
 * @fileoverview Configuration Loader
 *
 * Loads the textmill configuration from a YAML file and applies
 * environment overrides.
 *
 * @module config/loadConfig
 */

import { readFileSync, existsSync } from "fs";
import { parse as parseYaml } from "yaml";
import {
    LOG_LEVELS,
    isLogLevel,
    isPreprocessStep,
    type LogLevel,
    type PreprocessStep,
} from "@textmill/core";

/**
 * Application configuration
 */
export interface TextmillConfig {
    database: {
        /** SQLite file path (":memory:" for a throwaway database) */
        path: string;
    };

    /** Least severe level that is printed */
    logLevel: LogLevel;

    pipeline: {
        /** Re-run steps that are already done */
        override: boolean;

        /** Steps the `run` command processes, in pipeline order */
        steps: PreprocessStep[];
    };
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readSection(parsed: Record<string, unknown>, name: string): Record<string, unknown> {
    const section = parsed[name];
    if (section === undefined || section === null) {
        return {};
    }
    if (!isRecord(section)) {
        throw new Error(`Invalid config: '${name}' must be a mapping`);
    }
    return section;
}

function readSteps(value: unknown, fallback: PreprocessStep[]): PreprocessStep[] {
    if (value === undefined) {
        return fallback;
    }
    if (!Array.isArray(value)) {
        throw new Error("Invalid config: 'pipeline.steps' must be a list");
    }

    return value.map((step: unknown, index) => {
        if (!isPreprocessStep(step)) {
            throw new Error(`Invalid config: 'pipeline.steps[${index}]' is not a preprocess step: ${JSON.stringify(step)}`);
        }
        return step;
    });
}

/**
 * Load the configuration from a YAML file.
 *
 * Missing keys take their default value.
 *
 * @param filePath - Path to the textmill.yml file
 * @throws Error if the file doesn't exist or a value is invalid
 *
 * @example
 * ```typescript
 * const config = loadConfig("./config/textmill.yml");
 * console.log(config.pipeline.steps);
 * // ["tokenization", "segmentation"]
 * ```
 */
export function loadConfig(filePath: string): TextmillConfig {
    if (!existsSync(filePath)) {
        throw new Error(`Config file not found: ${filePath}`);
    }

    const content = readFileSync(filePath, "utf-8");
    const parsed: unknown = parseYaml(content) ?? {};

    if (!isRecord(parsed)) {
        throw new Error("Invalid config file format: expected a mapping");
    }

    const defaults = getDefaultConfig();
    const database = readSection(parsed, "database");
    const pipeline = readSection(parsed, "pipeline");

    const path = database.path ?? defaults.database.path;
    if (typeof path !== "string" || path === "") {
        throw new Error("Invalid config: 'database.path' must be a non-empty string");
    }

    const logLevel = parsed.logLevel ?? defaults.logLevel;
    if (!isLogLevel(logLevel)) {
        throw new Error(`Invalid config: 'logLevel' must be one of ${LOG_LEVELS.join(", ")}`);
    }

    const override = pipeline.override ?? defaults.pipeline.override;
    if (typeof override !== "boolean") {
        throw new Error("Invalid config: 'pipeline.override' must be a boolean");
    }

    return {
        database: { path },
        logLevel,
        pipeline: {
            override,
            steps: readSteps(pipeline.steps, defaults.pipeline.steps),
        },
    };
}

/**
 * Load the configuration with fallback to the defaults.
 *
 * @param filePath - Path to the textmill.yml file
 */
export function loadConfigWithFallback(filePath: string): TextmillConfig {
    try {
        return loadConfig(filePath);
    }
    catch (error) {
        console.warn(`Failed to load config from ${filePath}:`, error);
        return getDefaultConfig();
    }
}

/**
 * Apply `TEXTMILL_DB_PATH` and `TEXTMILL_LOG_LEVEL` on top of a config.
 *
 * @throws Error if TEXTMILL_LOG_LEVEL is not a log level
 */
export function applyEnvironment(config: TextmillConfig, env: NodeJS.ProcessEnv): TextmillConfig {
    const logLevel = env.TEXTMILL_LOG_LEVEL;
    if (logLevel !== undefined && logLevel !== "" && !isLogLevel(logLevel)) {
        throw new Error(`Invalid TEXTMILL_LOG_LEVEL: ${JSON.stringify(logLevel)}`);
    }

    return {
        ...config,
        database: {
            path: env.TEXTMILL_DB_PATH || config.database.path,
        },
        logLevel: isLogLevel(logLevel) ? logLevel : config.logLevel,
    };
}

/**
 * Get the default configuration.
 */
export function getDefaultConfig(): TextmillConfig {
    return {
        database: {
            path: "./textmill.db",
        },
        logLevel: "info",
        pipeline: {
            override: false,
            steps   : ["tokenization", "segmentation"],
        },
    };
}
