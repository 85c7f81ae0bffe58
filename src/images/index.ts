export { createImagePreparer } from "./preparer";
export { downloadToTemp } from "./download";
export { prepareImage } from "./prepare";
export type { ImagePreparer, PreparedImage, ImagePreparerOptions } from "./preparer";
export type { TempDownload, DownloadOptions } from "./download";
export type { ImageSize } from "./prepare";
