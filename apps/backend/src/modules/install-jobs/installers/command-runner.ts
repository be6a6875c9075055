import { execFile } from 'node:child_process';

export interface CommandResult {
    stdout: string;
    stderr: string;
}

export interface CommandOptions {
    cwd?: string;
    signal?: AbortSignal;
}

/** Runs an external program without a shell */
export type CommandRunner = (command: string, args: string[], options?: CommandOptions) => Promise<CommandResult>;

export const runCommand: CommandRunner = (command, args, options = {}) =>
    new Promise((resolve, reject) => {
        execFile(command, args, { cwd: options.cwd, signal: options.signal, encoding: 'utf8' }, (error, stdout, stderr) => {
            if (error) {
                reject(new Error(`${command} ${args.join(' ')} failed: ${stderr.trim() || error.message}`));
                return;
            }
            resolve({ stdout, stderr });
        });
    });
