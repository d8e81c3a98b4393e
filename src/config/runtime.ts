export type Runtime = {
    production: boolean;
    verbose: boolean;
    logLevel: 'info' | 'debug';
    pretty: boolean;
    quiet: boolean;
};

export function resolveRuntime(env: NodeJS.ProcessEnv = process.env, argv: string[] = process.argv): Runtime {
    const production = env.BJ_PRODUCTION === "true";
    const verbose = (env.BJ_VERBOSE === "true" || argv.includes("--verbose")) && !production;
    const quiet = env.QUIET === "1" || argv.includes("--quiet");
    const pretty = !production && !env.NO_COLOR && !argv.includes("--no-color");
    const logLevel = verbose ? 'debug' : 'info';

    return {
        production,
        verbose,
        logLevel,
        pretty,
        quiet,
    };
}
