export type TemplateVars = Record<string, string | number | boolean>;

const PLACEHOLDER = /\{\{\s*([A-Za-z_][\w.-]*)\s*\}\}/g;

export class TemplateError extends Error {
  constructor(public readonly missing: string[]) {
    super(`Undefined template variable${missing.length > 1 ? "s" : ""}: ${missing.join(", ")}`);
    this.name = "TemplateError";
  }
}

/**
 * Substitute `{{ name }}` placeholders. Every referenced name must be defined.
 */
export function renderTemplate(text: string, vars: TemplateVars): string {
  const missing = new Set<string>();
  const rendered = text.replace(PLACEHOLDER, (match, name: string) => {
    if (!Object.hasOwn(vars, name)) {
      missing.add(name);
      return match;
    }
    return String(vars[name]);
  });
  if (missing.size > 0) {
    throw new TemplateError([...missing]);
  }
  return rendered;
}

/**
 * Split a command line into argv. Single quotes are literal, double quotes
 * allow backslash escapes, unquoted whitespace separates words. No expansion.
 */
export function splitCommandLine(line: string): string[] {
  const args: string[] = [];
  let current = "";
  let inWord = false;
  let quote: "'" | '"' | null = null;

  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (quote === "'") {
      if (ch === "'") quote = null;
      else current += ch;
      continue;
    }
    if (quote === '"') {
      if (ch === '"') quote = null;
      else if (ch === "\\" && i + 1 < line.length) current += line[++i];
      else current += ch;
      continue;
    }
    if (ch === "'" || ch === '"') {
      quote = ch;
      inWord = true;
    } else if (ch === "\\" && i + 1 < line.length) {
      current += line[++i];
      inWord = true;
    } else if (/\s/.test(ch)) {
      if (inWord) {
        args.push(current);
        current = "";
        inWord = false;
      }
    } else {
      current += ch;
      inWord = true;
    }
  }

  if (quote) {
    throw new Error(`Unterminated ${quote} quote in command: ${line}`);
  }
  if (inWord) args.push(current);
  return args;
}
