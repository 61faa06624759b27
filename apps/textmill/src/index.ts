/**
 * @fileoverview textmill - Main Entry Point
 *
 * Command-line front end of the preprocessing ledger. Loads the YAML
 * configuration (with environment overrides), opens the SQLite store and
 * dispatches to a command.
 *
 * @module textmill
 */

// Load .env before any other imports that depend on environment variables
import "dotenv/config";

import { join, dirname } from "path";
import { fileURLToPath } from "url";

import { createLevelLogger } from "@textmill/core";

import {
    TextmillDatabase,
    SqliteDocumentRepository,
    SqliteTextChunkRepository,
} from "./adapters/sqlite/index.js";
import { applyEnvironment, loadConfigWithFallback } from "./config/index.js";
import { runCommand } from "./commands.js";

// Get directory of this file
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

/**
 * Main entry point
 */
async function main(): Promise<void> {
    const [command, ...args] = process.argv.slice(2);

    const configPath = process.env.TEXTMILL_CONFIG ?? join(__dirname, "..", "config", "textmill.yml");
    const config = applyEnvironment(loadConfigWithFallback(configPath), process.env);
    const logger = createLevelLogger(config.logLevel);

    logger.debug("Configuration loaded", { configPath, database: config.database.path });

    const database = new TextmillDatabase(config.database.path);

    try {
        process.exitCode = await runCommand(command, args, {
            documents: new SqliteDocumentRepository(database),
            chunks   : new SqliteTextChunkRepository(database),
            config,
            logger,
            out      : (line) => console.log(line),
        });
    }
    finally {
        database.close();
    }
}

main().catch((error: unknown) => {
    console.error("[FATAL] textmill failed:", error instanceof Error ? error.message : error);
    process.exit(1);
});
