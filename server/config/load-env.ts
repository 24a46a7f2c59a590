import fs from "fs";
import path from "path";
import dotenv from "dotenv";

const resolveRepoRoot = (startDir: string): string => {
  let currentDir = path.resolve(startDir);

  while (true) {
    if (fs.existsSync(path.join(currentDir, "package.json"))) {
      return currentDir;
    }

    const parentDir = path.dirname(currentDir);
    if (parentDir === currentDir) {
      return startDir;
    }
    currentDir = parentDir;
  }
};

// The more specific file wins: dotenv never overrides a variable that is already set.
export function loadEnvFiles(startDir: string = process.cwd()): string[] {
  const rootDir = resolveRepoRoot(startDir);
  const envFiles = process.env.NODE_ENV === "production"
    ? [".env.production", ".env"]
    : [".env"];

  const loaded: string[] = [];
  for (const envFile of envFiles) {
    const envPath = path.join(rootDir, envFile);
    if (fs.existsSync(envPath)) {
      dotenv.config({ path: envPath, override: false });
      loaded.push(envPath);
    }
  }
  return loaded;
}
