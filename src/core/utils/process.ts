import { spawn } from 'node:child_process';

export interface CommandResult {
    /** Exit code, or null when the process was killed. */
    code: number | null;
    stdout: string;
    stderr: string;
}

export type CommandRunner = (command: string, args: string[], options?: { timeoutMs?: number }) => Promise<CommandResult>;

/**
 * Runs a command to completion and collects its output.
 * A non-zero exit resolves normally; only a failure to start (e.g. ENOENT) rejects.
 */
export const runCommand: CommandRunner = (command, args, options = {}) => {
    return new Promise((resolve, reject) => {
        const child = spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] });
        let stdout = '';
        let stderr = '';
        child.stdout.setEncoding('utf8');
        child.stderr.setEncoding('utf8');
        child.stdout.on('data', (chunk: string) => { stdout += chunk; });
        child.stderr.on('data', (chunk: string) => { stderr += chunk; });

        const timer = options.timeoutMs === undefined
            ? undefined
            : setTimeout(() => child.kill('SIGKILL'), options.timeoutMs);

        child.on('error', (error) => {
            clearTimeout(timer);
            reject(error);
        });
        child.on('close', (code) => {
            clearTimeout(timer);
            resolve({ code, stdout, stderr });
        });
    });
};
