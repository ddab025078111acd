#!/usr/bin/env node
/**
 * grounded-coder - run the full coding pipeline over one interview transcript
 *
 * Usage:
 *   grounded-coder <transcript.txt> [outputDir]
 *
 * Reads ORACLE_* settings from the environment (or .env) and an optional
 * config.json (CONFIG_PATH to point elsewhere). Every stage's outputs are written
 * to outputDir (default ./out) as soon as the stage finishes.
 */

import { join, resolve } from "path";

import { exportFailure, exportStep } from "./export.js";
import { CodingJob } from "./job.js";
import { bindSession, createSession } from "./utils/ai/llms.js";
import {
    getOracleConfig,
    getPipelineConfig,
    loadConfigFile,
    type Stage,
} from "./utils/core/config.js";
import { logger } from "./utils/core/logger.js";
import { readTextFile } from "./utils/io/file.js";

const USAGE = "Usage: grounded-coder <transcript.txt> [outputDir]";

const main = async (args: string[]) => {
    const [transcriptPath, outputArg] = args;
    if (!transcriptPath || args.length > 2) {
        console.error(USAGE);
        process.exitCode = 2;
        return;
    }
    const outDir = resolve(outputArg ?? "out");
    logger.toFile(join(outDir, "logs", `${new Date().toISOString().replace(/[:.]/g, "-")}.log`));

    try {
        const file = loadConfigFile(process.env.CONFIG_PATH);
        const { baseURL, apiKey, models } = getOracleConfig(process.env, file);

        const bind = (stage: Stage) =>
            bindSession(createSession(models[stage], { baseURL, apiKey }));

        const job = new CodingJob({
            transcript: readTextFile(transcriptPath),
            llms: {
                open: bind("open"),
                filter: bind("filter"),
                axial: bind("axial"),
                selective: bind("selective"),
                storyline: bind("storyline"),
            },
            pipeline: getPipelineConfig(file),
            onStep: async (step) => {
                await exportStep(step, outDir);
            },
        });
        await job.execute();
        logger.success(`Outputs written to ${outDir}`, "cli");
    } catch (error) {
        const kept = exportFailure(error, outDir);
        if (kept) {
            logger.warn(`Rejected storyline reply kept at ${kept}`, "cli");
        }
        logger.error(error, true, "cli");
        process.exitCode = 1;
    } finally {
        await logger.close();
    }
};

await main(process.argv.slice(2));
