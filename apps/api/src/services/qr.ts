import sharp from "sharp";
import jsQRModule from "jsqr";

// jsqr ships a CommonJS bundle whose callable lives on `.default`.
const jsQR = jsQRModule.default;

export type QrDecodeResult =
  | { found: true; text: string }
  | { found: false; reason: "no_qr" | "decode_error"; detail?: string };

/**
 * Decodes the first QR code found in a raster image (JPEG, PNG, WebP, ...).
 *
 * The image is normalized to 8-bit sRGB with an alpha channel first, so
 * grayscale, CMYK and palette images scan the same way. Never throws.
 */
export async function decodeQrFromImage(bytes: Uint8Array): Promise<QrDecodeResult> {
  try {
    const { data, info } = await sharp(bytes)
      .rotate()
      .toColourspace("srgb")
      .ensureAlpha()
      .raw()
      .toBuffer({ resolveWithObject: true });
    if (info.channels !== 4) {
      return { found: false, reason: "decode_error", detail: `unexpected channels: ${info.channels}` };
    }
    const rgba = new Uint8ClampedArray(data.buffer, data.byteOffset, data.byteLength);
    const code = jsQR(rgba, info.width, info.height);
    if (!code || !code.data) return { found: false, reason: "no_qr" };
    return { found: true, text: code.data };
  } catch (e) {
    return { found: false, reason: "decode_error", detail: e instanceof Error ? e.message : String(e) };
  }
}
