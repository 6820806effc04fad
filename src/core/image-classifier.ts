import path from "node:path";

// Raster and RAW container formats we write sidecars for
export const SUPPORTED_EXTENSIONS: ReadonlySet<string> = new Set([
  "jpg", "jpeg", "png", "heic", "heif",
  "raw", "cr2", "nef", "arw", "dng",
  "tiff", "tif", "webp",
]);

/**
 * Whether a path names a supported image. Only the extension is inspected.
 */
export const isSupportedImage = (filePath: string): boolean => {
  const ext = path.extname(filePath);
  if (ext.length <= 1) {
    return false;
  }
  return SUPPORTED_EXTENSIONS.has(ext.slice(1).toLowerCase());
};
