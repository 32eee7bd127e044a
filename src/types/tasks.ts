export interface CommandInvocation {
    executable: string;
    args: string[];
    cwd: string;
    /** @default 120000 */
    timeoutMs?: number;
}

export interface CommandExecutionResult {
    ok: boolean;
    exitCode: number;
    stdout: string;
    stderr: string;
    durationMs: number;
}

export type CommandRunner = (invocation: CommandInvocation) => Promise<CommandExecutionResult>;

/** Values substituted for `{src}`, `{target}`, `{dir}` and `{root}` in task arguments. */
export interface TaskPlaceholders {
    src: string;
    target: string;
    dir: string;
    root: string;
}
