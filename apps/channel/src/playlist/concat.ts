import fsPromises from "node:fs/promises";
import path from "node:path";

// ffconcat is parsed by FFmpeg (not a shell): only backslash and single quote need escaping
// inside a quoted entry.
export const escapeConcatPath = (value: string) =>
  value.replace(/\\/g, "\\\\").replace(/'/g, "\\'");

export const unescapeConcatPath = (value: string) => {
  let result = "";
  for (let i = 0; i < value.length; i += 1) {
    const char = value[i];
    if (char === "\\" && i + 1 < value.length) {
      i += 1;
      result += value[i];
    } else {
      result += char;
    }
  }
  return result;
};

export const formatConcatEntry = (filePath: string) => `file '${escapeConcatPath(filePath)}'`;

export const serializePlaybackPlan = (paths: readonly string[]) =>
  paths.map((filePath) => `${formatConcatEntry(filePath)}\n`).join("");

const parseEntryValue = (raw: string) => {
  const value = raw.trim();
  if (value.length >= 2 && value.startsWith("'") && value.endsWith("'")) {
    return unescapeConcatPath(value.slice(1, -1));
  }
  return unescapeConcatPath(value);
};

export const parsePlaybackPlan = (body: string) => {
  const paths: string[] = [];
  for (const rawLine of body.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith("#")) {
      continue;
    }
    if (!line.startsWith("file ")) {
      // Other directives (ffconcat header, duration, inpoint...) carry no path.
      continue;
    }
    const value = parseEntryValue(line.slice("file ".length));
    if (value) {
      paths.push(value);
    }
  }
  return paths;
};

export const readPlaybackPlan = async (filePath: string) =>
  parsePlaybackPlan(await fsPromises.readFile(filePath, "utf8"));

export const writePlaybackPlan = async (filePath: string, paths: readonly string[]) => {
  await fsPromises.mkdir(path.dirname(filePath), { recursive: true });
  await fsPromises.writeFile(filePath, serializePlaybackPlan(paths), "utf8");
  return paths.length;
};
