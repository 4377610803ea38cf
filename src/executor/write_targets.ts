/**
 * Write Target Inference
 *
 * Best-effort static analysis of which paths a command writes to: redirect
 * targets, path operands of mutating verbs and `dd of=`. Used to confine the
 * sandboxed backend and to widen the snapshot set of a plan.
 */

import * as os from 'os';
import * as path from 'path';
import { parse } from 'shell-quote';
import { splitCommand } from '../policy/command_split';

export interface WriteTarget {
  /** Absolute path; for a glob, the directory the glob expands in */
  path: string;
  glob: boolean;
  source: 'redirect' | 'operand';
  /** Written through: a symlink at `path` is followed to its target */
  follow: boolean;
  /** Depends on shell expansion, so where it lands is unknown until run time */
  dynamic: boolean;
}

type OperandMode = 'all' | 'after-first' | 'last';

/**
 * Mutating verbs and which of their operands are written
 */
const VERBS: Record<string, OperandMode> = {
  rm: 'all',
  rmdir: 'all',
  unlink: 'all',
  shred: 'all',
  touch: 'all',
  mkdir: 'all',
  tee: 'all',
  truncate: 'all',
  mv: 'all',
  cp: 'last',
  ln: 'last',
  install: 'last',
  chmod: 'after-first',
  chown: 'after-first',
  chgrp: 'after-first',
};

/** Options whose value is the following token */
const VALUE_OPTIONS: Record<string, readonly string[]> = {
  truncate: ['-s', '--size', '-r', '--reference'],
  install: ['-m', '--mode', '-o', '--owner', '-g', '--group'],
  mkdir: ['-m', '--mode'],
  touch: ['-d', '--date', '-r', '--reference', '-t'],
};

/** Options whose value is the destination directory */
const TARGET_DIR_OPTIONS = ['-t', '--target-directory'];

/** Verbs that act on a symlink itself rather than on what it points to */
const NO_FOLLOW_VERBS = new Set(['rm', 'rmdir', 'unlink', 'mv']);

const PREFIX_COMMANDS = new Set(['sudo', 'doas', 'nohup', 'time', 'command', 'builtin', 'exec', 'nice']);

const WRITE_REDIRECTS = new Set(['>', '>>']);

const IGNORED_REDIRECT_TARGETS = new Set(['/dev/null', '/dev/stdout', '/dev/stderr', '/dev/tty']);

/** Variable, backtick or process substitution */
const EXPANSION = /[$`]/;
const SUBSTITUTION = /`|\$\(|[<>]\(/;

function expandHome(value: string): string {
  if (value === '~') {
    return os.homedir();
  }
  if (value.startsWith('~/')) {
    return path.join(os.homedir(), value.slice(2));
  }
  return value;
}

interface Tokens {
  words: string[];
  redirects: string[];
  globs: string[];
}

function tokenize(subCommand: string): Tokens {
  // Keep variables literal instead of expanding them to ''
  const entries = parse(subCommand, key => `$${key}`);
  const tokens: Tokens = { words: [], redirects: [], globs: [] };
  let expectRedirect = false;

  for (const entry of entries) {
    if (typeof entry === 'string') {
      if (expectRedirect) {
        tokens.redirects.push(entry);
        expectRedirect = false;
      } else {
        tokens.words.push(entry);
      }
      continue;
    }
    if ('comment' in entry) {
      break;
    }
    if ('pattern' in entry) {
      if (expectRedirect) {
        tokens.redirects.push(entry.pattern);
        expectRedirect = false;
      } else {
        tokens.words.push(entry.pattern);
        tokens.globs.push(entry.pattern);
      }
      continue;
    }
    if (WRITE_REDIRECTS.has(entry.op)) {
      // `2>file` tokenises as `2` `>` `file`
      const last = tokens.words[tokens.words.length - 1];
      if (last !== undefined && /^\d+$/.test(last)) {
        tokens.words.pop();
      }
      expectRedirect = true;
    } else {
      expectRedirect = false;
    }
  }
  return tokens;
}

function stripPrefixes(words: string[]): string[] {
  let i = 0;
  while (i < words.length) {
    const word = words[i];
    if (PREFIX_COMMANDS.has(word) || /^[A-Za-z_][A-Za-z0-9_]*=/.test(word)) {
      i++;
      continue;
    }
    if (word === 'env') {
      i++;
      continue;
    }
    // Options of a prefix command, e.g. `sudo -u root`
    if (i > 0 && word.startsWith('-')) {
      i++;
      continue;
    }
    break;
  }
  return words.slice(i);
}

function operandsOf(verb: string, args: string[]): { operands: string[]; targetDir?: string } {
  const valueOptions = VALUE_OPTIONS[verb] ?? [];
  const operands: string[] = [];
  let targetDir: string | undefined;
  let endOfOptions = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (!endOfOptions && arg === '--') {
      endOfOptions = true;
      continue;
    }
    if (!endOfOptions && arg.startsWith('-') && arg !== '-') {
      if (TARGET_DIR_OPTIONS.includes(arg) && (verb === 'cp' || verb === 'mv' || verb === 'ln' || verb === 'install')) {
        targetDir = args[++i];
      } else if (arg.startsWith('--target-directory=')) {
        targetDir = arg.slice('--target-directory='.length);
      } else if (valueOptions.includes(arg)) {
        i++;
      }
      continue;
    }
    operands.push(arg);
  }
  return { operands, targetDir };
}

function writtenOperands(verb: string, args: string[]): string[] {
  if (verb === 'dd') {
    return args.filter(arg => arg.startsWith('of=')).map(arg => arg.slice(3));
  }

  const mode = VERBS[verb];
  if (!mode) {
    return [];
  }

  const { operands, targetDir } = operandsOf(verb, args);
  if (targetDir !== undefined) {
    return verb === 'mv' ? [...operands, targetDir] : [targetDir];
  }
  switch (mode) {
    case 'all':
      return operands;
    case 'after-first':
      return operands.slice(1);
    case 'last':
      return operands.length > 1 ? operands.slice(-1) : [];
  }
}

/**
 * Paths the command writes to, resolved against `cwd`. A `cd` sub-command
 * moves the base directory for the sub-commands after it.
 */
export function inferWriteTargets(command: string, cwd: string): WriteTarget[] {
  const targets = new Map<string, WriteTarget>();
  let base = path.resolve(cwd);
  let baseDynamic = false;

  const add = (raw: string, source: WriteTarget['source'], glob: boolean, follow: boolean, substituted: boolean) => {
    const expanded = expandHome(raw);
    if (source === 'redirect' && IGNORED_REDIRECT_TARGETS.has(expanded)) {
      return;
    }
    if (expanded === '' || expanded.startsWith('&')) {
      return;
    }
    const resolved = path.resolve(base, glob ? path.dirname(expanded) : expanded);
    const dynamic = substituted || baseDynamic || EXPANSION.test(expanded);
    const existing = targets.get(resolved);
    if (existing) {
      existing.follow = existing.follow || follow;
      existing.dynamic = existing.dynamic || dynamic;
      return;
    }
    targets.set(resolved, { path: resolved, glob, source, follow, dynamic });
  };

  for (const subCommand of splitCommand(command)) {
    const tokens = tokenize(subCommand);
    const globs = new Set(tokens.globs);
    // Substitutions can reshape words, so no target of this sub-command is trusted
    const substituted = SUBSTITUTION.test(subCommand);

    for (const redirect of tokens.redirects) {
      add(redirect, 'redirect', false, true, substituted);
    }

    const words = stripPrefixes(tokens.words);
    if (words.length === 0) {
      continue;
    }

    const [verb, ...args] = words;
    const name = path.basename(verb);
    if (name === 'cd') {
      const next = expandHome(args[0] ?? os.homedir());
      baseDynamic = baseDynamic || substituted || EXPANSION.test(next);
      base = path.resolve(base, next);
      continue;
    }

    const follow = !NO_FOLLOW_VERBS.has(name);
    for (const operand of writtenOperands(name, args)) {
      add(operand, 'operand', globs.has(operand), follow, substituted);
    }
  }

  return Array.from(targets.values());
}
