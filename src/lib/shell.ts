import shellEscape from 'shell-escape';

/**
 * Builders for every command string sent to the remote shell.
 * Paths, names and packages always go through shell-escape.
 */

const quote = (value: string): string => shellEscape([value]);

const activate = (venv: string): string => `. ${quote(`${venv}/bin/activate`)}`;

const escapeRegex = (value: string): string =>
  value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

/**
 * @description Strip version specifiers and extras: `numpy==1.26` -> `numpy`.
 */
export function basePackageName(spec: string): string {
  return spec.split(/[<>=!~[;@\s]/)[0];
}

export function ensureTmuxSessionCommand(name: string): string {
  return `tmux has-session -t ${quote(name)} 2>/dev/null || tmux new-session -d -s ${quote(name)}`;
}

export function createVenvCommand(name: string): string {
  return shellEscape(['python3', '-m', 'venv', name]);
}

export function installPackagesCommand(venv: string, packages: string[]): string {
  return `${activate(venv)} && ${shellEscape(['pip', 'install', ...packages])}`;
}

export function upgradePipCommand(venv: string): string {
  return shellEscape([`${venv}/bin/pip`, 'install', '--upgrade', 'pip']);
}

export function removeDirectoryCommand(dir: string): string {
  return shellEscape(['rm', '-rf', '--', dir]);
}

export function directoryExistsCommand(dir: string): string {
  return `test -d ${quote(dir)} && echo exists || echo 'not found'`;
}

export function fileExistsCommand(file: string): string {
  return `test -f ${quote(file)} && echo yes || echo no`;
}

export function verifyPackagesCommand(venv: string, packages: string[]): string {
  const pattern = packages
    .map((pkg) => escapeRegex(basePackageName(pkg)))
    .join('|');
  return `${shellEscape([`${venv}/bin/pip`, 'list'])} | ${shellEscape(['grep', '-i', '-E', pattern])}`;
}

export function runPythonFileCommand(file: string, venv: string): string {
  return `${activate(venv)} && ${shellEscape(['python', file])}`;
}

export function pythonInterpreter(venv?: string): string {
  return venv ? `${venv}/bin/python3` : 'python3';
}

// the program text arrives on stdin
export function runPythonStdinCommand(interpreter: string): string {
  return shellEscape([interpreter, '-']);
}

export function runPythonWithCommand(interpreter: string, file: string): string {
  return shellEscape([interpreter, file]);
}

export function appendStdinCommand(file: string): string {
  return `cat >> ${quote(file)}`;
}

/**
 * @description Lines of a script worth running: trimmed, no blanks, no `#` comments.
 */
export function splitScript(script: string): string[] {
  return script
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('#'));
}
