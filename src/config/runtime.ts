export type Runtime = {
    production: boolean;
    verbose: boolean;
    logLevel: 'silent' | 'warn' | 'info' | 'debug' | 'trace';
    pretty: boolean;
};

const LEVELS: ReadonlyArray<Runtime['logLevel']> = ['silent', 'warn', 'info', 'debug', 'trace'];

function parseLevel(raw: string | undefined): Runtime['logLevel'] | undefined {
    const v = (raw ?? '').trim().toLowerCase();
    return LEVELS.find((l) => l === v);
}

export function resolveRuntime(env: NodeJS.ProcessEnv = process.env): Runtime {
    const production = env.LEDGER_PRODUCTION === "true";
    const verbose = env.LEDGER_VERBOSE === "true" && !production;

    const pretty = !production && env.LEDGER_PRETTY !== "false";
    const logLevel = parseLevel(env.LOG_LEVEL) ?? (production ? 'info' : (verbose ? 'trace' : 'info'));

    return {
        production,
        verbose,
        logLevel,
        pretty,
    };
}
