import { readFile, writeFile } from "node:fs/promises";

export const API_KEY_VAR = "OPENROUTER_API_KEY";

async function readIfExists(path: string): Promise<string> {
  try {
    return await readFile(path, "utf8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") return "";
    throw error;
  }
}

/**
 * Write `OPENROUTER_API_KEY=<key>` into a dotenv file, replacing an existing
 * assignment and leaving every other line alone.
 */
export async function saveApiKeyToEnvFile(path: string, apiKey: string): Promise<void> {
  const existing = await readIfExists(path);
  const lines = existing ? existing.replace(/\n$/, "").split("\n") : [];
  const assignment = `${API_KEY_VAR}=${apiKey}`;
  const at = lines.findIndex((line) => line.trimStart().startsWith(`${API_KEY_VAR}=`));
  if (at >= 0) lines[at] = assignment;
  else lines.push(assignment);
  await writeFile(path, `${lines.join("\n")}\n`, "utf8");
}
