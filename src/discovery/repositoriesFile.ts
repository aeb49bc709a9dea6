import fs from "fs/promises";
import { parse } from "yaml";
import type { CredentialMethod } from "../credentials/CredentialHandle.js";
import { logger } from "../logger.js";
import { parseRepositoryUrl, type RepositoryRef } from "../repos/RepositoryRef.js";
import { RepositoriesFileSchema } from "../schema.js";

export interface ConfiguredRepository {
  repo: RepositoryRef;
  accessHint: CredentialMethod | null;
}

export class RepositoriesFileError extends Error {
  constructor(readonly file: string, message: string) {
    super(`${file}: ${message}`);
    this.name = "RepositoriesFileError";
  }
}

export function parseRepositoriesYaml(text: string, file = "<inline>"): ConfiguredRepository[] {
  let raw: unknown;
  try {
    raw = parse(text);
  } catch (e) {
    throw new RepositoriesFileError(file, `invalid YAML: ${e instanceof Error ? e.message : String(e)}`);
  }

  const parsed = RepositoriesFileSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new RepositoriesFileError(file, issues.join("; "));
  }

  return parsed.data.repositories.map((entry, index) => {
    try {
      return { repo: parseRepositoryUrl(entry.url, entry.protocol), accessHint: entry.access ?? null };
    } catch (e) {
      throw new RepositoriesFileError(file, `repositories.${index}: ${e instanceof Error ? e.message : String(e)}`);
    }
  });
}

/** Reads the static repository list; a missing file means no static repositories. */
export async function loadRepositoriesFile(file: string): Promise<ConfiguredRepository[]> {
  let text: string;
  try {
    text = await fs.readFile(file, "utf8");
  } catch (e) {
    if (e instanceof Error && Reflect.get(e, "code") === "ENOENT") {
      logger.info("repositories file not found, starting without static repositories", { file });
      return [];
    }
    throw e;
  }
  const repos = parseRepositoriesYaml(text, file);
  logger.info("repositories file loaded", { file, count: repos.length });
  return repos;
}
