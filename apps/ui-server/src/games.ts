import fs from "fs/promises";
import path from "path";
import { GameConfigDefaults, parseGameConfig } from "@benchfleet/orchestrator";
import { GameRecord } from "./types";

const GAME_FILE = /\.ya?ml$/i;

async function walk(dir: string): Promise<string[]> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  const paths: string[] = [];

  for (const entry of entries) {
    const resolved = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      paths.push(...(await walk(resolved)));
      continue;
    }
    if (entry.isFile() && GAME_FILE.test(entry.name)) {
      paths.push(resolved);
    }
  }

  return paths;
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export async function findGameFiles(rootDir: string): Promise<string[]> {
  try {
    const files = await walk(rootDir);
    return files.sort();
  } catch (error) {
    if (isMissing(error)) {
      return [];
    }
    throw error;
  }
}

/** Invalid files are listed with their validation error instead of failing the listing. */
export async function loadGames(rootDir: string, defaults?: GameConfigDefaults): Promise<GameRecord[]> {
  const gamePaths = await findGameFiles(rootDir);
  const games: GameRecord[] = [];

  for (const gamePath of gamePaths) {
    const ref = path.relative(rootDir, gamePath).split(path.sep).join("/");
    const raw = await fs.readFile(gamePath, "utf-8");
    try {
      const game = parseGameConfig(raw, gamePath, defaults);
      games.push({
        ref,
        path: gamePath,
        name: game.metadata.name,
        engine: game.flow.kind,
        size: game.flow.kind === "steps" ? game.flow.steps.length : Object.keys(game.flow.states).length,
      });
    } catch (error) {
      games.push({ ref, path: gamePath, error: error instanceof Error ? error.message : String(error) });
    }
  }

  return games;
}
