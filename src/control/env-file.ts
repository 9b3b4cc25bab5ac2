import { promises as fs } from "fs";
import path from "path";
import dotenv from "dotenv";
import { ConfigurationError, isMissingFileError, PersistenceError, toError } from "../errors/app.errors";

const KEY_LINE = /^\s*(?:export\s+)?([A-Za-z_][A-Za-z0-9_]*)\s*=/;

const NEEDS_QUOTES = /[\s#]|^['"`]/;

/**
 * Whether a value reads back unchanged through `dotenv.parse` once written.
 * Line breaks are never accepted; the file is rewritten line by line.
 */
export function isRepresentableEnvValue(value: string): boolean {
  if (/[\r\n]/.test(value)) return false;
  if (!NEEDS_QUOTES.test(value)) return true;
  if (value.endsWith("\\")) return false;
  if (!value.includes("'") || !value.includes("`")) return true;
  return !value.includes('"') && !/\\[nr]/.test(value);
}

/**
 * Quote a value only when a dotenv reader would otherwise split or truncate it.
 * dotenv does not unescape quotes, so the quote style is one the value lacks.
 */
export function serializeEnvValue(value: string): string {
  if (value === "") return '""';
  if (!isRepresentableEnvValue(value)) {
    throw new ConfigurationError(`Env value cannot be written unchanged: ${JSON.stringify(value)}`);
  }
  if (!NEEDS_QUOTES.test(value)) return value;
  if (!value.includes("'")) return `'${value}'`;
  if (!value.includes("`")) return `\`${value}\``;
  return `"${value}"`;
}

export function filterAllowed(
  values: Record<string, string>,
  allowlist: readonly string[],
): Record<string, string> {
  const allowed = new Set(allowlist);
  const result: Record<string, string> = {};
  for (const key of Object.keys(values).sort()) {
    if (allowed.has(key)) result[key] = values[key];
  }
  return result;
}

export async function readEnvFile(
  filePath: string,
  allowlist: readonly string[],
): Promise<Record<string, string>> {
  let text: string;
  try {
    text = await fs.readFile(filePath, "utf8");
  } catch (err) {
    if (isMissingFileError(err)) return {};
    throw new PersistenceError(`Unable to read env file ${filePath}`, filePath, toError(err));
  }
  return filterAllowed(dotenv.parse(text), allowlist);
}

/**
 * Rewrite `KEY=value` lines in place, append keys not yet present, and replace
 * the file atomically. Comments and unrelated lines are kept as they are.
 */
export function applyEnvUpdates(text: string, updates: Record<string, string>): string {
  const lines = text === "" ? [] : text.replace(/\r?\n$/, "").split(/\r?\n/);
  const found = new Set<string>();
  const next = lines.map((line) => {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) return line;
    const match = KEY_LINE.exec(line);
    if (!match) return line;
    const key = match[1];
    if (!(key in updates)) return line;
    found.add(key);
    return `${key}=${serializeEnvValue(updates[key])}`;
  });
  for (const [key, value] of Object.entries(updates)) {
    if (!found.has(key)) next.push(`${key}=${serializeEnvValue(value)}`);
  }
  return `${next.join("\n")}\n`;
}

export async function updateEnvFile(
  filePath: string,
  updates: Record<string, string>,
  allowlist: readonly string[],
): Promise<Record<string, string>> {
  let current = "";
  try {
    current = await fs.readFile(filePath, "utf8");
  } catch (err) {
    if (!isMissingFileError(err)) {
      throw new PersistenceError(`Unable to read env file ${filePath}`, filePath, toError(err));
    }
  }
  const tmpPath = path.join(path.dirname(filePath), `.${path.basename(filePath)}.${process.pid}.tmp`);
  try {
    await fs.writeFile(tmpPath, applyEnvUpdates(current, updates), "utf8");
    await fs.rename(tmpPath, filePath);
  } catch (err) {
    throw new PersistenceError(`Unable to write env file ${filePath}`, filePath, toError(err));
  }
  return readEnvFile(filePath, allowlist);
}
