import sharp from "sharp";

export type ImageSize = {
  readonly width: number;
  readonly height: number;
  readonly quality: number;
};

/**
 * Converts an image to JPEG and shrinks it to fit within `size`, keeping the
 * aspect ratio. Smaller images are not enlarged; transparency is flattened
 * onto white.
 */
export async function prepareImage(
  inputPath: string,
  outputPath: string,
  size: ImageSize,
): Promise<string> {
  await sharp(inputPath)
    .rotate()
    .resize({
      width: size.width,
      height: size.height,
      fit: "inside",
      withoutEnlargement: true,
    })
    .flatten({ background: "#ffffff" })
    .jpeg({ quality: size.quality, mozjpeg: true })
    .toFile(outputPath);

  return outputPath;
}
