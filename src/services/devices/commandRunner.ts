import { spawn } from 'child_process';

export interface CommandResult {
  exitCode: number | null;
  output: string;
  timedOut: boolean;
  /** errno code when the process could not be started (e.g. ENOENT) */
  spawnErrorCode?: string;
}

export type CommandRunner = (
  command: string,
  args: string[],
  timeoutMs: number
) => Promise<CommandResult>;

const MAX_OUTPUT_LENGTH = 4096;

/**
 * Spawn a command, collect its combined output and kill it once `timeoutMs`
 * has elapsed. Never rejects.
 */
export const spawnCommand: CommandRunner = (command, args, timeoutMs) =>
  new Promise((resolve) => {
    let output = '';
    let timedOut = false;
    let settled = false;
    let timer: NodeJS.Timeout | undefined;

    const finish = (result: CommandResult) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      resolve(result);
    };

    if (!command) {
      finish({ exitCode: null, output: 'empty command', timedOut, spawnErrorCode: 'ENOENT' });
      return;
    }

    const child = spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] });

    const collect = (chunk: Buffer) => {
      if (output.length < MAX_OUTPUT_LENGTH) {
        output += chunk.toString('utf-8');
      }
    };
    child.stdout.on('data', collect);
    child.stderr.on('data', collect);

    timer = setTimeout(() => {
      timedOut = true;
      child.kill('SIGKILL');
    }, timeoutMs);

    child.on('error', (error: NodeJS.ErrnoException) => {
      finish({
        exitCode: null,
        output: output || error.message,
        timedOut,
        spawnErrorCode: error.code ?? 'UNKNOWN',
      });
    });

    child.on('close', (code) => {
      finish({ exitCode: code, output: output.trim(), timedOut });
    });
  });

/**
 * Split a configured command line into executable and arguments. Double
 * quotes group words; `{file}` is replaced by `filePath`, which is appended
 * when the command line has no `{file}` token.
 */
export const buildInvocation = (
  commandLine: string,
  filePath?: string
): { command: string; args: string[] } => {
  const tokens = Array.from(commandLine.matchAll(/"([^"]*)"|(\S+)/g), (match) =>
    match[1] !== undefined ? match[1] : match[2]
  );

  let sawFileToken = false;
  const expanded = tokens.map((token) => {
    if (filePath !== undefined && token.includes('{file}')) {
      sawFileToken = true;
      return token.split('{file}').join(filePath);
    }
    return token;
  });

  if (filePath !== undefined && !sawFileToken) {
    expanded.push(filePath);
  }

  const [command = '', ...args] = expanded;
  return { command, args };
};
