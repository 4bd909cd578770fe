import { CellMode, ExecutionResult } from '../interfaces';
import { RemoteSession } from './remote-session';
import {
  appendStdinCommand,
  fileExistsCommand,
  pythonInterpreter,
  runPythonStdinCommand,
  runPythonWithCommand,
} from '../lib/shell';
import {
  ValidationError,
  sanitizeRemotePath,
  sanitizeVenvName,
} from '../lib/sanitization';

export const DEFAULT_PERSISTENT_FILE = 'persistent.py';

/**
 * Parse a cell mode line:
 *
 *   (empty)                      shell
 *   python                       python, default venv when present
 *   python:VENV                  python in VENV (or `python: VENV`)
 *   python persistent [FILE]     append to FILE, then run it
 *   python:VENV persistent [FILE]
 */
export function parseCellMode(line: string): CellMode {
  const trimmed = line.trim();
  if (!trimmed.startsWith('python')) {
    return { kind: 'shell' };
  }

  const [head, ...rest] = trimmed.split(/\s+/);
  let venv: string | undefined;

  if (head.includes(':')) {
    const [prefix, attached] = head.split(':', 2);
    if (prefix !== 'python') {
      return { kind: 'shell' };
    }
    // `python: VENV` names the venv in the next token
    const name = attached || rest.shift();
    if (!name) {
      throw new ValidationError('Missing virtual environment after "python:"');
    }
    venv = sanitizeVenvName(name);
  } else if (head !== 'python') {
    return { kind: 'shell' };
  }

  const mode: CellMode = { kind: 'python' };
  if (venv) mode.venv = venv;

  if (rest[0] === 'persistent') {
    mode.persistentFile = sanitizeRemotePath(
      rest[1] ?? DEFAULT_PERSISTENT_FILE,
      'Persistent file'
    );
  }

  return mode;
}

async function resolveInterpreter(
  session: RemoteSession,
  venv: string | undefined
): Promise<string> {
  if (venv) return pythonInterpreter(venv);

  const fallback = session.config.venvName;
  const probe = await session.execute(fileExistsCommand(pythonInterpreter(fallback)));
  return probe.stdout.trim() === 'yes' ? pythonInterpreter(fallback) : pythonInterpreter();
}

/**
 * Run a cell body on the remote host according to its mode.
 */
export async function runCell(
  session: RemoteSession,
  mode: CellMode,
  body: string
): Promise<ExecutionResult> {
  if (mode.kind === 'shell') {
    return session.execute(body);
  }

  const interpreter = await resolveInterpreter(session, mode.venv);

  if (!mode.persistentFile) {
    return session.execute(runPythonStdinCommand(interpreter), { stdin: body });
  }

  const append = await session.execute(appendStdinCommand(mode.persistentFile), {
    stdin: body.endsWith('\n') ? body : `${body}\n`,
  });
  if (append.exitCode !== 0) {
    return append;
  }

  return session.execute(runPythonWithCommand(interpreter, mode.persistentFile));
}
