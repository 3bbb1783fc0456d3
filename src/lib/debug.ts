import { mkdir, writeFile } from "fs/promises";
import { join } from "path";

const DEBUG_DIR = "debug";
let debugEnabled = false;

export async function initDebug(enabled: boolean | undefined) {
  debugEnabled = Boolean(enabled);
  if (debugEnabled) {
    await mkdir(DEBUG_DIR, { recursive: true });
    console.log(`🐛 Debug mode enabled - outputs will be saved to ${DEBUG_DIR}/`);
  }
}

export function isDebugEnabled(): boolean {
  return debugEnabled;
}

export async function debugSave(filename: string, content: string | object) {
  if (!debugEnabled) return;

  const filepath = join(DEBUG_DIR, filename);
  const data = typeof content === "string" ? content : JSON.stringify(content, mapReplacer, 2);

  await writeFile(filepath, data);
  console.log(`  💾 Debug saved: ${filename}`);
}

export function debugLog(...args: unknown[]) {
  if (!debugEnabled) return;
  console.log("  🐛", ...args);
}

// Taxonomies are Maps; dump them as plain objects
function mapReplacer(_key: string, value: unknown): unknown {
  return value instanceof Map ? Object.fromEntries(value) : value;
}
