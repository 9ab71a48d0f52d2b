import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";

export class JsonFileError extends Error {
  readonly path: string;

  constructor(path: string, message: string) {
    super(message);
    this.name = "JsonFileError";
    this.path = path;
  }
}

export const readJsonFile = async (path: string): Promise<unknown> => {
  let contents: string;
  try {
    contents = await readFile(path, "utf8");
  } catch (error) {
    const code =
      error instanceof Error && "code" in error ? String(error.code) : null;
    if (code === "ENOENT") {
      throw new JsonFileError(path, `File not found: ${path}`);
    }
    throw error;
  }

  try {
    const parsed: unknown = JSON.parse(contents);
    return parsed;
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new JsonFileError(path, `Invalid JSON in ${path}: ${reason}`);
  }
};

export const writeJsonFile = async (
  path: string,
  data: unknown,
): Promise<void> => {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, `${JSON.stringify(data, null, 2)}\n`, "utf8");
};
