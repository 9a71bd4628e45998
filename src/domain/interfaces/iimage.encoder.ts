import { ImageFormatType } from "../enums/providers";

export interface ImageEncodeOptions {
  width: number;
  height: number;
  format: ImageFormatType;
}

export interface IImageEncoder {
  /** Decode, convert to RGB, resize and re-encode. Throws when the image cannot be decoded. */
  encode(filePath: string, options: ImageEncodeOptions): Promise<Buffer>;
}
