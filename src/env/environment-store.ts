import { chmod, readFile, rename, stat, unlink, writeFile } from 'fs/promises';
import { existsSync } from 'fs';
import { basename, dirname, join } from 'path';
import { RecreateError } from '../errors';

export type QuotingMode = 'auto' | 'always';

export interface UpsertOptions {
  quoting?: QuotingMode;
}

interface ParsedLine {
  key: string;
  value: string;
  exported: boolean;
}

const ENTRY_PATTERN = /^\s*(export\s+)?([A-Za-z_][A-Za-z0-9_.-]*)\s*=\s*(.*?)\s*$/s;
const NEEDS_QUOTING_PATTERN = /[\s#$&'()*;<>?[\\\]`{|}~!"]/;

/**
 * Removes every surrounding pair of double quotes, so `"v"` and `""v""`
 * both normalize to `v`. Quotes inside the value are left alone.
 */
export function stripSurroundingQuotes(value: string): string {
  let result = value;
  while (result.length >= 2 && result.startsWith('"') && result.endsWith('"')) {
    result = result.slice(1, -1);
  }
  return result;
}

/**
 * Inside double quotes a backslash escapes `\\`, `"`, `n` and `r`, so every
 * entry stays on one physical line.
 */
function escapeQuoted(value: string): string {
  return value.replace(/[\\"\n\r]/g, char => {
    switch (char) {
      case '\n':
        return '\\n';
      case '\r':
        return '\\r';
      default:
        return `\\${char}`;
    }
  });
}

function unescapeQuoted(value: string): string {
  return value.replace(/\\(["\\nr])/g, (_match: string, char: string) => {
    switch (char) {
      case 'n':
        return '\n';
      case 'r':
        return '\r';
      default:
        return char;
    }
  });
}

export function formatValue(value: string, quoting: QuotingMode = 'auto'): string {
  const bare = stripSurroundingQuotes(value);
  if (quoting === 'always' || NEEDS_QUOTING_PATTERN.test(bare)) {
    return `"${escapeQuoted(bare)}"`;
  }
  return bare;
}

function parseLine(line: string): ParsedLine | null {
  const match = ENTRY_PATTERN.exec(line);
  if (!match) {
    return null;
  }

  const [, exportPrefix, key, rawValue] = match;
  let value = rawValue;
  const quote = value.charAt(0);
  if (quote === '"' && value.length >= 2 && value.endsWith(quote)) {
    value = unescapeQuoted(value.slice(1, -1));
  } else if (quote === "'" && value.length >= 2 && value.endsWith(quote)) {
    value = value.slice(1, -1);
  } else {
    value = value.replace(/\s+#.*$/, '');
  }

  return { key, value, exported: Boolean(exportPrefix) };
}

function isIgnorable(line: string): boolean {
  const trimmed = line.trim();
  return trimmed === '' || trimmed.startsWith('#');
}

/**
 * Reads and writes KEY=VALUE environment files. Every call takes the file path;
 * the file on disk is the only state.
 */
export class EnvironmentStore {

  /**
   * Parse the file into an ordered mapping. A missing file is an empty mapping.
   * @throws RecreateError (EnvFileUnreadable) when a line is not KEY=VALUE
   */
  async load(path: string): Promise<Map<string, string>> {
    const content = await this.readIfExists(path);
    const entries = new Map<string, string>();
    if (content === null) {
      return entries;
    }

    this.splitLines(content).forEach((line, index) => {
      if (isIgnorable(line)) {
        return;
      }
      const parsed = parseLine(line);
      if (!parsed) {
        throw new RecreateError('EnvFileUnreadable', `${path}:${index + 1} is not a KEY=VALUE line`, {
          details: line
        });
      }
      entries.set(parsed.key, parsed.value);
    });

    return entries;
  }

  async get(path: string, key: string): Promise<string | undefined> {
    const entries = await this.load(path);
    return entries.get(key);
  }

  /**
   * Replace the line holding `key`, or append one. Every other line is kept
   * exactly as it was, and the file is replaced atomically.
   */
  async upsert(path: string, key: string, value: string, options: UpsertOptions = {}): Promise<void> {
    // Validates the existing content before anything is rewritten
    await this.load(path);

    const content = (await this.readIfExists(path)) ?? '';
    const formatted = formatValue(value, options.quoting);
    const lines = content === '' ? [] : this.splitLines(content);
    const output: string[] = [];
    let replaced = false;

    for (const line of lines) {
      const parsed = isIgnorable(line) ? null : parseLine(line);
      if (!parsed || parsed.key !== key) {
        output.push(line);
        continue;
      }
      if (!replaced) {
        output.push(`${parsed.exported ? 'export ' : ''}${key}=${formatted}`);
        replaced = true;
      }
    }

    if (!replaced) {
      output.push(`${key}=${formatted}`);
    }

    await this.writeAtomically(path, `${output.join('\n')}\n`);
  }

  private splitLines(content: string): string[] {
    const lines = content.split(/\r?\n/);
    if (lines[lines.length - 1] === '') {
      lines.pop();
    }
    return lines;
  }

  private async readIfExists(path: string): Promise<string | null> {
    if (!existsSync(path)) {
      return null;
    }
    try {
      return await readFile(path, 'utf-8');
    } catch (error) {
      throw new RecreateError('EnvFileUnreadable', `Cannot read ${path}: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  private async writeAtomically(path: string, content: string): Promise<void> {
    const tempPath = join(dirname(path), `.${basename(path)}.${process.pid}.${Date.now()}.tmp`);
    // The replacement keeps the permissions of the file it replaces
    const mode = existsSync(path) ? (await stat(path)).mode & 0o777 : undefined;
    try {
      await writeFile(tempPath, content, 'utf-8');
      if (mode !== undefined) {
        await chmod(tempPath, mode);
      }
      await rename(tempPath, path);
    } catch (error) {
      if (existsSync(tempPath)) {
        await unlink(tempPath);
      }
      throw error;
    }
  }
}
