import { execFile } from 'child_process';
import { promisify } from 'util';

const execFileAsync = promisify(execFile);

const MAX_BUFFER = 32 * 1024 * 1024;

export interface CommandResult {
  stdout: string;
  stderr: string;
}

export interface CommandOptions {
  timeoutMs?: number;
}

export type CommandRunner = (command: string, args: string[], options?: CommandOptions) => Promise<CommandResult>;

export class CommandError extends Error {
  constructor(
    message: string,
    public readonly command: string,
    public readonly exitCode: number | null,
    public readonly stderr: string,
    public readonly notFound: boolean,
    public readonly timedOut: boolean,
  ) {
    super(message);
    this.name = 'CommandError';
  }
}

function readField(err: object, key: string): unknown {
  return key in err ? Reflect.get(err, key) : undefined;
}

function toCommandError(command: string, err: unknown): CommandError {
  if (!(err instanceof Error)) {
    return new CommandError(String(err), command, null, '', false, false);
  }
  const code = readField(err, 'code');
  const stderr = readField(err, 'stderr');
  const killed = readField(err, 'killed') === true;
  const signal = readField(err, 'signal');

  return new CommandError(
    err.message,
    command,
    typeof code === 'number' ? code : null,
    typeof stderr === 'string' ? stderr : '',
    code === 'ENOENT',
    killed && signal === 'SIGTERM',
  );
}

export function createCommandRunner(defaultTimeoutMs: number): CommandRunner {
  return async (command, args, options) => {
    try {
      const { stdout, stderr } = await execFileAsync(command, args, {
        timeout: options?.timeoutMs ?? defaultTimeoutMs,
        maxBuffer: MAX_BUFFER,
        encoding: 'utf8',
      });
      return { stdout, stderr };
    } catch (err) {
      throw toCommandError(command, err);
    }
  };
}

/** Last few non-empty lines of a tool's stderr, for user-facing messages. */
export function stderrTail(stderr: string, lines: number = 3): string {
  return stderr
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(Boolean)
    .slice(-lines)
    .join(' ');
}
