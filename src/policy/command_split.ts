/**
 * Command Splitting
 *
 * Quote-aware normalisation and list/pipeline splitting of shell command
 * strings. Quoted text, `$(...)` and backtick substitutions are never split.
 */

const WHITESPACE = /[ \t\r\f\v]/;

interface ScanState {
  quote: '"' | "'" | null;
  substitutionDepth: number;
  inBacktick: boolean;
  escaped: boolean;
}

function initialState(): ScanState {
  return { quote: null, substitutionDepth: 0, inBacktick: false, escaped: false };
}

/**
 * Advance quote/substitution state over one character.
 * Returns true when the character is plain top-level text.
 */
function advance(state: ScanState, text: string, i: number): boolean {
  const ch = text[i];

  if (state.escaped) {
    state.escaped = false;
    return false;
  }
  if (ch === '\\' && state.quote !== "'") {
    state.escaped = true;
    return false;
  }
  if (state.quote) {
    if (ch === state.quote) {
      state.quote = null;
    }
    return false;
  }
  if (ch === "'" || ch === '"') {
    state.quote = ch;
    return false;
  }
  if (ch === '`') {
    state.inBacktick = !state.inBacktick;
    return false;
  }
  if (ch === '(' && text[i - 1] === '$') {
    state.substitutionDepth++;
    return false;
  }
  if (state.substitutionDepth > 0) {
    if (ch === '(') {
      state.substitutionDepth++;
    } else if (ch === ')') {
      state.substitutionDepth--;
    }
    return false;
  }
  return !state.inBacktick;
}

/**
 * Trim and collapse runs of unquoted whitespace to a single space.
 * Unquoted newlines become a `;` separator.
 */
export function normalizeCommand(command: string): string {
  const state = initialState();
  let out = '';
  let pendingSpace = false;

  for (let i = 0; i < command.length; i++) {
    const ch = command[i];
    const wasQuoted = state.quote !== null || state.escaped;

    if (!wasQuoted && (WHITESPACE.test(ch) || ch === '\n')) {
      if (ch === '\n') {
        out = out.trimEnd();
        if (out.length > 0 && !out.endsWith(';')) {
          out += ';';
        }
      }
      pendingSpace = out.length > 0;
      continue;
    }

    advance(state, command, i);
    if (pendingSpace) {
      out += ' ';
      pendingSpace = false;
    }
    out += ch;
  }

  return out.replace(/;$/, '').trim();
}

/**
 * Quotes and substitutions are all closed
 */
export function isBalanced(command: string): boolean {
  const state = initialState();
  for (let i = 0; i < command.length; i++) {
    advance(state, command, i);
  }
  return state.quote === null && state.substitutionDepth === 0 && !state.inBacktick && !state.escaped;
}

/**
 * Split a normalised command into sub-commands on unquoted `;`, `&&`, `||`,
 * `|` and `&`. Redirections such as `2>&1` and `&>` are not separators.
 * Unbalanced input is returned whole.
 */
export function splitCommand(command: string): string[] {
  const normalized = normalizeCommand(command);
  if (normalized === '') {
    return [];
  }
  if (!isBalanced(normalized)) {
    return [normalized];
  }

  const parts: string[] = [];
  const state = initialState();
  let current = '';

  const flush = () => {
    const part = current.trim();
    if (part) {
      parts.push(part);
    }
    current = '';
  };

  for (let i = 0; i < normalized.length; i++) {
    const ch = normalized[i];
    const topLevel = advance(state, normalized, i);

    if (topLevel && (ch === ';' || ch === '|' || ch === '&')) {
      const prev = normalized[i - 1];
      const next = normalized[i + 1];

      if (ch === '&' && (prev === '>' || prev === '<' || next === '>')) {
        current += ch;
        continue;
      }
      if ((ch === '&' || ch === '|') && next === ch) {
        i++;
      } else if (ch === '|' && next === '&') {
        i++;
      }
      flush();
      continue;
    }

    current += ch;
  }
  flush();

  return parts;
}

/**
 * The command needs a shell: it uses operators, redirections, globs,
 * substitutions or variable expansion
 */
export function needsShell(command: string): boolean {
  const state = initialState();
  for (let i = 0; i < command.length; i++) {
    const ch = command[i];
    if (ch === '$' || ch === '`') {
      return true;
    }
    const topLevel = advance(state, command, i);
    if (topLevel && /[;&|<>*?(){}[\]~]/.test(ch)) {
      return true;
    }
  }
  return !isBalanced(command);
}
