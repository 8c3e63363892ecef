import fs from 'node:fs';
import { z } from 'zod';
import { PAIR_PATTERN } from '@strata/core/constants';
import { ConfigLoadError } from '@strata/core/errors';
import { isConfigObject, toConfigValue, type ConfigValue, type RawDocument } from './tree';

export const STDIN_SOURCE = '-';

const SNIPPET_RADIUS = 20;

const blank = (segment: string) => segment.replace(/[^\n]/g, ' ');

/**
 * Blanks out `//`, `#` and block comments, plus trailing commas, outside of
 * string literals. Removed characters become spaces so offsets into the
 * result line up with the original text.
 */
export const stripComments = (text: string): string => {
  let out = '';
  let index = 0;
  while (index < text.length) {
    const char = text[index];
    if (char === '"') {
      let end = index + 1;
      while (end < text.length && text[end] !== '"') {
        end += text[end] === '\\' ? 2 : 1;
      }
      out += text.slice(index, end + 1);
      index = end + 1;
      continue;
    }
    if (char === '#' || (char === '/' && text[index + 1] === '/')) {
      const newline = text.indexOf('\n', index);
      const end = newline === -1 ? text.length : newline;
      out += blank(text.slice(index, end));
      index = end;
      continue;
    }
    if (char === '/' && text[index + 1] === '*') {
      const close = text.indexOf('*/', index + 2);
      const end = close === -1 ? text.length : close + 2;
      out += blank(text.slice(index, end));
      index = end;
      continue;
    }
    out += char;
    index += 1;
  }
  return stripTrailingCommas(out);
};

const stripTrailingCommas = (text: string): string => {
  let out = '';
  let inString = false;
  for (let index = 0; index < text.length; index += 1) {
    const char = text[index];
    if (inString) {
      if (char === '\\') {
        out += char + (text[index + 1] ?? '');
        index += 1;
        continue;
      }
      if (char === '"') inString = false;
      out += char;
      continue;
    }
    if (char === '"') {
      inString = true;
    } else if (char === ',') {
      const next = text.slice(index + 1).match(/^\s*([}\]])/);
      if (next) {
        out += ' ';
        continue;
      }
    }
    out += char;
  }
  return out;
};

class SyntaxOffset {
  constructor(readonly offset: number) {}
}

const NUMBER_TOKEN = /-?(?:0|[1-9]\d*)(?:\.\d+)?(?:[eE][+-]?\d+)?/y;

/**
 * Walks `text` as strict JSON and returns the offset of the first character
 * that cannot be parsed, or -1 when it parses. Used when the engine's error
 * message carries no position.
 */
export const locateSyntaxError = (text: string): number => {
  let index = 0;
  const fail = (): never => {
    throw new SyntaxOffset(index);
  };
  const skipWhitespace = () => {
    while (index < text.length && ' \t\n\r'.includes(text[index])) index += 1;
  };
  const consume = (char: string) => {
    if (text[index] !== char) fail();
    index += 1;
  };
  const literal = (word: string) => {
    if (!text.startsWith(word, index)) fail();
    index += word.length;
  };
  const string = () => {
    consume('"');
    while (index < text.length && text[index] !== '"') {
      if (text[index] < ' ') fail();
      index += text[index] === '\\' ? 2 : 1;
    }
    consume('"');
  };
  const number = () => {
    NUMBER_TOKEN.lastIndex = index;
    if (!NUMBER_TOKEN.test(text)) fail();
    index = NUMBER_TOKEN.lastIndex;
  };
  const container = (open: string, close: string, entry: () => void) => {
    consume(open);
    skipWhitespace();
    if (text[index] === close) {
      index += 1;
      return;
    }
    for (;;) {
      entry();
      skipWhitespace();
      if (text[index] !== ',') break;
      index += 1;
    }
    consume(close);
  };
  const value = (): void => {
    skipWhitespace();
    const char = text[index];
    if (char === '{') {
      container('{', '}', () => {
        skipWhitespace();
        string();
        skipWhitespace();
        consume(':');
        value();
      });
    } else if (char === '[') {
      container('[', ']', value);
    } else if (char === '"') {
      string();
    } else if (char === 't') {
      literal('true');
    } else if (char === 'f') {
      literal('false');
    } else if (char === 'n') {
      literal('null');
    } else if (char !== undefined && /[-\d]/.test(char)) {
      number();
    } else {
      fail();
    }
  };

  try {
    value();
    skipWhitespace();
    if (index < text.length) fail();
    return -1;
  } catch (error) {
    if (error instanceof SyntaxOffset) return error.offset;
    throw error;
  }
};

const describePosition = (text: string, reason: string): string => {
  const match = reason.match(/position (\d+)/);
  const offset = match ? Number(match[1]) : locateSyntaxError(text);
  // newer engines quote the whole input after the token
  const shortReason = reason.replace(/, ".*" is not valid JSON$/s, '');
  if (offset < 0) return shortReason;
  const before = text.slice(0, offset);
  const line = before.split('\n').length;
  const column = offset - before.lastIndexOf('\n');
  const snippet = text
    .slice(Math.max(0, offset - SNIPPET_RADIUS), offset + SNIPPET_RADIUS)
    .replace(/\s+/g, ' ')
    .trim();
  return `${shortReason} (line ${line}, column ${column}) near '${snippet}'`;
};

export const parseConfigText = (text: string, source: string): RawDocument => {
  if (!text.trim()) {
    throw new ConfigLoadError(`Config file "${source}" is empty.`, source);
  }

  const cleaned = stripComments(text);
  let parsed: unknown;
  try {
    parsed = JSON.parse(cleaned);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigLoadError(
      `Failed to parse configuration "${source}": ${describePosition(cleaned, reason)}`,
      source
    );
  }

  let document: ConfigValue;
  try {
    document = toConfigValue(parsed);
  } catch (error) {
    if (!(error instanceof TypeError)) throw error;
    throw new ConfigLoadError(`Config file "${source}" is invalid: ${error.message}`, source);
  }
  if (!isConfigObject(document)) {
    throw new ConfigLoadError(`Config file "${source}" must contain a JSON object at the top level.`, source);
  }
  return document;
};

const readSource = (source: string): string => {
  try {
    return source === STDIN_SOURCE ? fs.readFileSync(0, 'utf8') : fs.readFileSync(source, 'utf8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new ConfigLoadError(
        `Config file "${source}" not found! Please create a config file or check whether it exists.`,
        source
      );
    }
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigLoadError(`Config file "${source}" could not be read: ${reason}`, source);
  }
};

export const loadConfigDocument = (source: string): RawDocument => parseConfigText(readSource(source), source);

const pairsFileSchema = z.array(z.string().regex(PAIR_PATTERN));

export const loadPairsFile = (filePath: string): string[] => {
  const cleaned = stripComments(readSource(filePath));
  let parsed: unknown;
  try {
    parsed = JSON.parse(cleaned);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigLoadError(
      `Failed to parse pairs file "${filePath}": ${describePosition(cleaned, reason)}`,
      filePath
    );
  }
  const result = pairsFileSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigLoadError(
      `Pairs file "${filePath}" must contain a JSON array of pairs like "ETH/BTC".`,
      filePath
    );
  }
  return result.data;
};
