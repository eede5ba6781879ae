import sharp from "sharp";
import type { ImageValidatorPort, ValidationOutcome } from "../../application/ports";
import { errorMessage } from "../../domain/errors";
import { logger } from "../../utils/logger";

export class SharpImageValidator implements ImageValidatorPort {
  constructor(private readonly maxImagePixels: number) {}

  async validate(bytes: Buffer): Promise<ValidationOutcome> {
    try {
      const metadata = await sharp(bytes).metadata();

      if (!metadata.width || !metadata.height) {
        return { ok: false, error: "No se pudieron leer las dimensiones" };
      }

      const pixels = metadata.width * metadata.height;
      if (pixels > this.maxImagePixels) {
        return { ok: false, error: `Imagen demasiado grande: ${pixels} px (max ${this.maxImagePixels})` };
      }

      // metadata solo lee la cabecera; un archivo truncado recien falla al decodificar
      await sharp(bytes).raw().toBuffer();

      return {
        ok: true,
        metadata: {
          width: metadata.width,
          height: metadata.height,
          format: metadata.format || "unknown",
          size: bytes.length,
        },
      };
    } catch (error) {
      logger.warn("No se pudo decodificar la imagen", { error: errorMessage(error) });
      return { ok: false, error: errorMessage(error) };
    }
  }
}
