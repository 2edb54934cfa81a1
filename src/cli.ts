/**
 * catto command line
 * Prints a random cat, or a named one with --iggy, --lucy and friends
 */

import { parseArgs, type ParseArgsConfig } from "util";
import { AssetLoadError } from "./lib/asset.js";
import { ConfigError, loadConfig, resolveVersion, type CattoConfig } from "./lib/config.js";
import { listPatternNames, PROFILES, UnknownPatternError, type CatProfile } from "./engine/registry.js";
import { renderCatHandler, type RenderCatInput } from "./tools/render_cat.js";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

/**
 * Line-oriented console output. Each call ends with a line terminator.
 */
export interface Writer {
    out(line: string): void;
    err(line: string): void;
}

export const consoleWriter: Writer = {
    out: (line) => {
        process.stdout.write(`${line}\n`);
    },
    err: (line) => {
        process.stderr.write(`${line}\n`);
    },
};

function isBrokenPipe(error: unknown): boolean {
    return error instanceof Error && "code" in error && error.code === "EPIPE";
}

/**
 * Stops output quietly once the reader goes away (`catto | head -1`).
 * Other stream errors are rethrown.
 */
export function ignoreBrokenPipe(stream: NodeJS.EventEmitter): void {
    stream.on("error", (error: unknown) => {
        if (!isBrokenPipe(error)) {
            throw error;
        }
    });
}

type OptionConfig = NonNullable<ParseArgsConfig["options"]>[string];

const OPTIONS: Record<string, OptionConfig> = {
    ...Object.fromEntries(
        PROFILES.flatMap((profile): Array<[string, OptionConfig]> => [
            [profile.name, { type: "boolean", short: profile.short }],
            ...profile.aliases.map((alias): [string, OptionConfig] => [alias, { type: "boolean" }]),
        ])
    ),
    pattern: { type: "string" },
    seed: { type: "string" },
    list: { type: "boolean" },
    help: { type: "boolean", short: "h" },
    version: { type: "boolean", short: "v" },
};

interface CliFlags {
    /** Profiles picked on the command line, with the flag that picked each */
    profiles: Array<{ profile: CatProfile; flag: string }>;
    pattern?: string;
    seed?: string;
    list: boolean;
    help: boolean;
    version: boolean;
}

class UsageError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "UsageError";
    }
}

function isParseArgsError(error: unknown): error is Error {
    return (
        error instanceof Error &&
        "code" in error &&
        typeof error.code === "string" &&
        error.code.startsWith("ERR_PARSE_ARGS")
    );
}

function readArgs(argv: string[]) {
    try {
        return parseArgs({ args: argv, options: OPTIONS, strict: true, allowPositionals: false }).values;
    } catch (error) {
        if (isParseArgsError(error)) {
            throw new UsageError(error.message);
        }
        throw error;
    }
}

function parseFlags(argv: string[]): CliFlags {
    const values = readArgs(argv);

    const profiles = PROFILES.flatMap((profile) => {
        const flag = [profile.name, ...profile.aliases].find((name) => values[name] === true);
        return flag === undefined ? [] : [{ profile, flag: `--${flag}` }];
    });

    const pattern = values.pattern;
    const seed = values.seed;
    return {
        profiles,
        pattern: typeof pattern === "string" ? pattern : undefined,
        seed: typeof seed === "string" ? seed : undefined,
        list: values.list === true,
        help: values.help === true,
        version: values.version === true,
    };
}

function usage(): string[] {
    const cats = PROFILES.map((profile) => {
        const aliases = profile.aliases.map((alias) => `--${alias}`).join(", ");
        return `  -${profile.short}, --${profile.name}`.padEnd(22) + (aliases ? `same as ${aliases}` : "");
    });
    return [
        "Usage: catto [cat | --pattern <name>] [--seed <n>]",
        "",
        "Prints an ASCII cat. With no cat picked, the coat pattern is random.",
        "",
        "Cats:",
        ...cats,
        "",
        "Options:",
        "  --pattern <name>    use a named pattern (see --list)",
        "  --seed <n>          make the random pattern reproducible",
        "                      (write a negative seed as --seed=-5)",
        "  --list              list pattern names and cats",
        "  -h, --help          show this help",
        "  -v, --version       show the version",
    ];
}

function listing(): string[] {
    return [
        "Patterns:",
        ...listPatternNames().map((name) => `  ${name}`),
        "Cats:",
        ...PROFILES.map((profile) =>
            profile.aliases.length > 0
                ? `  ${profile.name} (${profile.aliases.join(", ")})`
                : `  ${profile.name}`
        ),
    ];
}

function buildInput(flags: CliFlags, config: CattoConfig): RenderCatInput {
    const selections = [
        ...flags.profiles.map((selected) => selected.flag),
        ...(flags.pattern !== undefined ? ["--pattern"] : []),
    ];
    if (selections.length > 1) {
        throw new UsageError(`only one cat can be shown at a time (got ${selections.join(", ")})`);
    }

    let seed = config.seed;
    if (flags.seed !== undefined) {
        if (!/^-?\d+$/.test(flags.seed)) {
            throw new UsageError(`--seed must be an integer (got "${flags.seed}")`);
        }
        seed = Number(flags.seed);
    }

    const [selected] = flags.profiles;
    return {
        profile: selected?.profile.name,
        pattern: flags.pattern,
        seed,
    };
}

/**
 * Runs catto and returns the exit status
 */
export function runCli(
    argv: string[],
    writer: Writer = consoleWriter,
    env: NodeJS.ProcessEnv = process.env
): number {
    try {
        const flags = parseFlags(argv);
        if (flags.help) {
            usage().forEach((line) => writer.out(line));
            return EXIT_OK;
        }

        const config = loadConfig(env);
        if (flags.version) {
            writer.out(resolveVersion(config));
            return EXIT_OK;
        }
        if (flags.list) {
            listing().forEach((line) => writer.out(line));
            return EXIT_OK;
        }

        const result = renderCatHandler(buildInput(flags, config), { assetDir: config.assetDir });
        writer.out(result.text);
        writer.out(result.caption);
        return EXIT_OK;
    } catch (error) {
        if (error instanceof UsageError) {
            writer.err(`catto: ${error.message}`);
            writer.err("Try 'catto --help' for more information.");
            return EXIT_USAGE;
        }
        if (error instanceof UnknownPatternError) {
            writer.err(`catto: unknown pattern "${error.patternName}". Run 'catto --list' to see them all.`);
            return EXIT_USAGE;
        }
        if (error instanceof AssetLoadError || error instanceof ConfigError) {
            writer.err(`[catto] ${error.message}`);
            return EXIT_FAILURE;
        }
        throw error;
    }
}
