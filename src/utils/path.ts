import path from "node:path";

export const normalizePath = (p: string): string => p.replace(/\\/g, "/");

export const getRelativePath = (from: string, to: string): string => {
  const relative = path.relative(from, to);
  return normalizePath(relative);
};

/**
 * Path shown to the user: relative to the scan root when inside it
 */
export const getDisplayPath = (basePath: string, filePath: string): string => {
  const relative = getRelativePath(basePath, filePath);
  if (relative === "") {
    return path.basename(filePath);
  }
  if (relative.startsWith("..") || path.isAbsolute(relative)) {
    return normalizePath(filePath);
  }
  return relative;
};
