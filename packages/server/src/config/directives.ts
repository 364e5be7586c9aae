/**
 * Directive file loader
 *
 * One directive per line, whitespace-separated tokens, double quotes to keep
 * whitespace inside a token, `#` starts a comment:
 *
 *   FaultEngine on
 *   FaultInject filesystem ENOSPC write close   # disk full on upload
 */

import { readFile } from "node:fs/promises";
import type { Directive } from "@fsfault/shared";

export class DirectiveSyntaxError extends Error {
  constructor(
    message: string,
    public readonly line: number
  ) {
    super(`line ${line}: ${message}`);
    this.name = "DirectiveSyntaxError";
  }
}

function tokenize(text: string, line: number): string[] {
  const tokens: string[] = [];
  let current = "";
  let inToken = false;
  let quoted = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text.charAt(i);

    if (quoted) {
      if (ch === "\\" && i + 1 < text.length) {
        current += text.charAt(++i);
      } else if (ch === '"') {
        quoted = false;
      } else {
        current += ch;
      }
      continue;
    }

    if (ch === '"') {
      quoted = true;
      inToken = true;
    } else if (ch === "#" && !inToken) {
      break;
    } else if (/\s/.test(ch)) {
      if (inToken) {
        tokens.push(current);
        current = "";
        inToken = false;
      }
    } else {
      current += ch;
      inToken = true;
    }
  }

  if (quoted) {
    throw new DirectiveSyntaxError("unterminated quoted string", line);
  }
  if (inToken) {
    tokens.push(current);
  }
  return tokens;
}

export function parseDirectives(text: string): Directive[] {
  const directives: Directive[] = [];

  text.split(/\r?\n/).forEach((raw, index) => {
    const line = index + 1;
    const [name, ...args] = tokenize(raw, line);
    if (name !== undefined) {
      directives.push({ name, args, line });
    }
  });

  return directives;
}

export async function loadDirectiveFile(path: string): Promise<Directive[]> {
  const text = await readFile(path, "utf-8");
  return parseDirectives(text);
}
