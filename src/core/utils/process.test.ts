import { describe, it, expect } from 'vitest';
import { runCommand } from './process';

// Child processes are the running Node binary
const NODE = process.execPath;

describe('runCommand', () => {
    it('should collect both output streams and the exit code', async () => {
        const result = await runCommand(NODE, ['-e', 'process.stdout.write("out"); process.stderr.write("err"); process.exit(3)']);
        expect(result).toEqual({ code: 3, stdout: 'out', stderr: 'err' });
    });

    it('should reject when the command cannot be started', async () => {
        await expect(runCommand('/nonexistent/cmus-remote', ['-Q'])).rejects.toThrow(/ENOENT/);
    });

    it('should kill a command that outlives its timeout', async () => {
        const result = await runCommand(NODE, ['-e', 'setTimeout(() => {}, 10000)'], { timeoutMs: 50 });
        expect(result.code).toBeNull();
    });
});
