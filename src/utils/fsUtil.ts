import { mkdir, rename, stat, writeFile } from "node:fs/promises";
import path from "node:path";

export const existsPath = async (p: string) => {
  try {
    await stat(p);
    return true;
  } catch {
    return false;
  }
};

export const writeFileAtomic = async (filePath: string, data: string) => {
  await mkdir(path.dirname(filePath), { recursive: true });
  const tempPath = `${filePath}.tmp`;
  await writeFile(tempPath, data, "utf8");
  await rename(tempPath, filePath);
};
