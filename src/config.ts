import fs from "fs";
import path from "path";
import * as dotenv from "dotenv";

dotenv.config();

const MEMORY_DB = ":memory:";

// src/ under ts-jest, dist/src/ once built
export const PACKAGE_ROOT =
  [path.resolve(__dirname, ".."), path.resolve(__dirname, "..", "..")].find((dir) =>
    fs.existsSync(path.join(dir, "package.json"))
  ) ?? process.cwd();

function resolveDbPath(value: string | undefined): string {
  const dbPath = value || "data/movies.db";
  return dbPath === MEMORY_DB ? dbPath : path.resolve(dbPath);
}

function readInteger(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value ?? "", 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

export const DB_PATH = resolveDbPath(process.env.MOVIES_DB_PATH);
export const IN_MEMORY_DB = DB_PATH === MEMORY_DB;

export const OMDB_API_KEY = process.env.OMDB_API_KEY;
export const OMDB_API_URL = process.env.OMDB_API_URL || "http://www.omdbapi.com/";
export const OMDB_TIMEOUT_MS = readInteger(process.env.OMDB_TIMEOUT_MS, 10_000);

export const SITE_TEMPLATE_PATH = process.env.SITE_TEMPLATE_PATH
  ? path.resolve(process.env.SITE_TEMPLATE_PATH)
  : path.join(PACKAGE_ROOT, "static", "index_template.html");
export const SITE_OUTPUT_DIR = path.resolve(process.env.SITE_OUTPUT_DIR || ".");
export const TEMPLATE_TITLE_TOKEN = "__TEMPLATE_TITLE__";
export const TEMPLATE_GRID_TOKEN = "__TEMPLATE_MOVIE_GRID__";

export const LOG_LEVEL = process.env.LOG_LEVEL || "info";

// manual rating entry only, OMDb values are stored as returned
export const MIN_RATING = 1;
export const MAX_RATING = 10;
