#!/usr/bin/env node
/**
 * cardbatch CLI
 *
 * Usage:
 *   npx tsx packages/cardbatch/src/scripts/cardbatch.ts upload [folder...] [--config=<path>] [--headless] [--env-file=<path>]
 *   npx tsx packages/cardbatch/src/scripts/cardbatch.ts rotate <folder...> [--config=<path>]
 *   npx tsx packages/cardbatch/src/scripts/cardbatch.ts inspect <folder> [--config=<path>]
 *
 * Bare folder names resolve against default_images_path from the config.
 */

import { existsSync } from "node:fs";
import path from "node:path";
import { createSession } from "../adapters";
import { DEFAULT_CONFIG_PATH } from "../config/constants";
import { loadEnvFile, requireCredentials } from "../config/env";
import { loadUploadConfig, type UploadConfig } from "../config/uploadConfig";
import { ConsoleValidationGate, UploadSequencer } from "../engine";
import { ConfigurationError, toErrorMessage } from "../errors";
import { OrientationRewriter } from "../imaging";
import { getLogger, registerSecret } from "../monitoring";
import { formatInspection, formatRotationResult, formatSummaryTable } from "../report/summaryTable";

const USAGE = `cardbatch: rotate card scans and upload them as batches

Usage: cardbatch <command> [args]

Commands:
  upload [folder...]        Rotate, then upload each folder as a new batch
  rotate <folder...>        Only rewrite the orientation tags
  inspect <folder>          Show the current orientation tag of every image
  help                      Show this message

Options:
  --config=<path>           Upload config (default: ${DEFAULT_CONFIG_PATH})
  --env-file=<path>         Credentials file (default: config/.env, then .env)
  --headless                Run the browser without a window
`;

// ── Arguments ──

function parseArg(args: string[], name: string): string | undefined {
    const prefix = `--${name}=`;
    const arg = args.find((a) => a.startsWith(prefix));
    return arg ? arg.slice(prefix.length) : undefined;
}

function hasFlag(args: string[], name: string): boolean {
    return args.includes(`--${name}`);
}

function positionals(args: string[]): string[] {
    return args.filter((a) => !a.startsWith("--"));
}

function resolveFolders(names: string[], basePath: string): string[] {
    return names.map((name) => (path.isAbsolute(name) ? name : path.resolve(basePath, name)));
}

/** The config is optional for rotate and inspect; it only supplies the base folder. */
async function loadOptionalConfig(args: string[]): Promise<UploadConfig | null> {
    const explicit = parseArg(args, "config");
    if (!explicit && !existsSync(DEFAULT_CONFIG_PATH)) return null;
    return loadUploadConfig(explicit ?? DEFAULT_CONFIG_PATH);
}

// ── Commands ──

async function upload(args: string[]): Promise<number> {
    loadEnvFile(parseArg(args, "env-file"));
    const credentials = requireCredentials();
    registerSecret(credentials.password);
    const config = await loadUploadConfig(parseArg(args, "config") ?? DEFAULT_CONFIG_PATH);

    const names = positionals(args);
    const targets =
        names.length > 0
            ? resolveFolders(names, config.default_images_path)
            : [path.resolve(config.default_images_path)];

    const logger = getLogger();
    const session = await createSession({
        headless: hasFlag(args, "headless"),
        navigationTimeoutMs: config.timeouts.navigation_ms,
        actionTimeoutMs: config.timeouts.element_ms,
    });

    const sequencer = new UploadSequencer({
        config,
        credentials,
        session,
        gate: new ConsoleValidationGate(),
        logger,
    });

    sequencer.events.on("folder:start", (e) => {
        console.log(`\n[${e.index + 1}/${e.total}] ${e.folderName}`);
    });
    sequencer.events.on("step:complete", (e) => {
        console.log(`  ok  ${e.step}`);
    });
    sequencer.events.on("step:retry", (e) => {
        console.log(`  ..  ${e.step} retry ${e.attempt}/${e.maxAttempts}: ${e.error}`);
    });
    sequencer.events.on("step:failed", (e) => {
        console.log(`  !!  ${e.step} failed (${e.state}): ${e.error}`);
    });

    const result = await sequencer.runAll(targets);
    console.log(`\n${formatSummaryTable(result.summaries, result.fatalError)}`);
    return result.exitCode;
}

async function rotate(args: string[]): Promise<number> {
    const names = positionals(args);
    if (names.length === 0) {
        console.error("Usage: cardbatch rotate <folder...>");
        return 1;
    }

    const config = await loadOptionalConfig(args);
    const rewriter = new OrientationRewriter({ logger: getLogger() });
    let exitCode = 0;

    for (const folder of resolveFolders(names, config?.default_images_path ?? process.cwd())) {
        try {
            const result = await rewriter.rewrite(folder);
            console.log(formatRotationResult(result));
            if (result.errors > 0) exitCode = 1;
        } catch (err) {
            console.error(`${folder}: ${toErrorMessage(err)}`);
            exitCode = 1;
        }
    }
    return exitCode;
}

async function inspect(args: string[]): Promise<number> {
    const [name] = positionals(args);
    if (!name) {
        console.error("Usage: cardbatch inspect <folder>");
        return 1;
    }

    const config = await loadOptionalConfig(args);
    const [folder] = resolveFolders([name], config?.default_images_path ?? process.cwd());
    const rows = await new OrientationRewriter({ logger: getLogger() }).inspect(folder);
    console.log(formatInspection(rows));
    return 0;
}

// ── Main ──

async function main(argv: string[]): Promise<number> {
    const [command, ...args] = argv;

    switch (command) {
        case "upload":
            return upload(args);
        case "rotate":
            return rotate(args);
        case "inspect":
            return inspect(args);
        case "help":
        case undefined:
            console.log(USAGE);
            return 0;
        default:
            console.error(`Unknown command: ${command}\n`);
            console.log(USAGE);
            return 1;
    }
}

main(process.argv.slice(2)).then(
    (code) => {
        process.exitCode = code;
    },
    (err: unknown) => {
        if (err instanceof ConfigurationError) {
            console.error(`Configuration error: ${err.message}\n`);
            console.log(USAGE);
        } else {
            getLogger().error("cardbatch failed", { error: toErrorMessage(err) });
        }
        process.exitCode = 1;
    },
);
