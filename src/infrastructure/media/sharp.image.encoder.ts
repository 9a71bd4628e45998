import sharp from "sharp";
import { IImageEncoder, ImageEncodeOptions } from "../../domain/interfaces/iimage.encoder";

/**
 * Flattens to sRGB without alpha, stretches to the target size and re-encodes.
 */
export class SharpImageEncoder implements IImageEncoder {
  async encode(filePath: string, options: ImageEncodeOptions): Promise<Buffer> {
    const image = sharp(filePath)
      .removeAlpha()
      .toColourspace("srgb")
      .resize(options.width, options.height, { fit: "fill" });

    return options.format === "png" ? image.png().toBuffer() : image.jpeg().toBuffer();
  }
}
