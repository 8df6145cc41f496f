import fs from "fs/promises";
import path from "path";

export const readText = async (file: string) => fs.readFile(file, "utf8");

export const readBytes = async (file: string): Promise<Uint8Array> =>
  new Uint8Array(await fs.readFile(file));

export const readJSON = async (file: string): Promise<unknown> => {
  if (!(await fileExists(file))) {
    return null;
  }

  const content = await fs.readFile(file, "utf8");
  return JSON.parse(content);
};

export const writeText = async (file: string, content: string) => {
  // Ensure directory exists
  await fs.mkdir(path.dirname(file), { recursive: true });
  await fs.writeFile(file, content, "utf8");
};

export const fileExists = async (file: string) => {
  return fs
    .access(file)
    .then(() => true)
    .catch(() => false);
};

export const withExtension = (file: string, extension: string) =>
  path.join(
    path.dirname(file),
    `${path.basename(file, path.extname(file))}${extension}`
  );
