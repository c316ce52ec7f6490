import fs from "node:fs";
import path from "node:path";

function unquote(value: string) {
  const q = value.charAt(0);
  if (value.length < 2 || (q !== '"' && q !== "'") || !value.endsWith(q)) return value;
  const inner = value.slice(1, -1);
  if (q === "'") return inner;
  return inner
    .replace(/\\n/g, "\n")
    .replace(/\\r/g, "\r")
    .replace(/\\t/g, "\t")
    .replace(/\\"/g, '"')
    .replace(/\\\\/g, "\\");
}

export function parseEnvFile(contents: string): Record<string, string> {
  const out: Record<string, string> = {};
  for (const rawLine of contents.replace(/\r\n/g, "\n").split("\n")) {
    const line = rawLine.trim();
    if (!line || line.startsWith("#")) continue;
    const m = line.match(/^(?:export\s+)?([A-Za-z_][A-Za-z0-9_]*)\s*=\s*(.*)$/);
    if (!m) continue;
    const [, key, rest = ""] = m;
    if (!key) continue;

    let value = rest.trim();
    // Inline comments only apply to unquoted values.
    if (!value.startsWith('"') && !value.startsWith("'")) {
      const hash = value.indexOf(" #");
      if (hash !== -1) value = value.slice(0, hash).trim();
    }
    out[key] = unquote(value);
  }
  return out;
}

/**
 * Fills `env` from `.env.local` then `.env` in `root`. Variables that are already set win.
 * Returns the files that were read.
 */
export function loadEnv(root = process.cwd(), env: NodeJS.ProcessEnv = process.env): string[] {
  const loaded: string[] = [];
  for (const file of [".env.local", ".env"]) {
    const p = path.join(root, file);
    if (!fs.existsSync(p)) continue;
    const parsed = parseEnvFile(fs.readFileSync(p, "utf8"));
    for (const [k, v] of Object.entries(parsed)) {
      if (env[k] == null) env[k] = v;
    }
    loaded.push(file);
  }
  return loaded;
}
