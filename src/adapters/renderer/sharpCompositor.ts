import sharp from "sharp";
import type { ArtifactSinkPort, CompositorPort, RenderPageParams } from "../../application/ports";
import { errorMessage } from "../../domain/errors";
import {
  ArtifactRef,
  CardRef,
  FOOTER_HEIGHT_PX,
  HEADER_HEIGHT_PX,
  QUALITY_PROFILES,
  QualityProfile,
  RenderFallback,
  ResolvedImage,
} from "../../domain/models";
import { logger } from "../../utils/logger";
import { footerSvg, footerText, headerSvg, labelLines, labelsSvg, pageLabel, placeholderSvg } from "./svgOverlays";

export const CANVAS_BACKGROUND = "#2c3e50";

export class SharpCompositor implements CompositorPort {
  constructor(private readonly sink: ArtifactSinkPort) {}

  async render(params: RenderPageParams): Promise<ArtifactRef> {
    const { page, images, config, totalPages, exportedAt, outputPath } = params;
    const profile = QUALITY_PROFILES[config.quality];

    const layers: sharp.OverlayOptions[] = [];
    const fallbacks: RenderFallback[] = [];

    layers.push({
      input: Buffer.from(
        headerSvg({
          widthPx: page.widthPx,
          heightPx: HEADER_HEIGHT_PX,
          title: config.title,
          pageLabel: pageLabel(page.pageIndex, totalPages),
          fontPx: profile.titleFontPx,
        })
      ),
      left: 0,
      top: 0,
    });

    for (const cell of page.cells) {
      const card = await this.cardLayer(cell.card, images.get(cell.card.id), profile);
      if (card.error !== undefined) fallbacks.push({ cardId: cell.card.id, error: card.error });
      layers.push({ input: card.input, left: cell.xPx, top: cell.yPx });

      const lines = labelLines(cell.card, config.labels);
      if (lines.length > 0) {
        layers.push({
          input: Buffer.from(
            labelsSvg({
              widthPx: profile.cardWidthPx,
              heightPx: profile.labelHeightPx,
              lines,
              fontPx: profile.labelFontPx,
            })
          ),
          left: cell.xPx,
          top: cell.yPx + profile.cardHeightPx,
        });
      }
    }

    layers.push({
      input: Buffer.from(
        footerSvg({
          widthPx: page.widthPx,
          heightPx: FOOTER_HEIGHT_PX,
          text: footerText(exportedAt),
          fontPx: profile.labelFontPx + 2,
        })
      ),
      left: 0,
      top: page.heightPx - FOOTER_HEIGHT_PX,
    });

    const canvas = sharp({
      create: { width: page.widthPx, height: page.heightPx, channels: 4, background: CANVAS_BACKGROUND },
    }).composite(layers);

    const encoded =
      config.format === "jpeg"
        ? await canvas.jpeg({ quality: profile.jpegQuality }).toBuffer()
        : await canvas.png({ compressionLevel: profile.pngCompressionLevel }).toBuffer();

    await this.sink.write(outputPath, encoded);

    return {
      pageIndex: page.pageIndex,
      path: outputPath,
      bytes: encoded.length,
      widthPx: page.widthPx,
      heightPx: page.heightPx,
      ...(fallbacks.length > 0 ? { fallbacks } : {}),
    };
  }

  private async cardLayer(
    card: CardRef,
    image: ResolvedImage | undefined,
    profile: QualityProfile
  ): Promise<{ input: Buffer; error?: string }> {
    const { cardWidthPx: w, cardHeightPx: h } = profile;
    const placeholder = () => Buffer.from(placeholderSvg({ widthPx: w, heightPx: h, name: card.name, profile }));

    if (!image || image.origin === "placeholder") return { input: placeholder() };

    try {
      const input = await sharp(image.bytes)
        .resize(w, h, { fit: "contain", background: { r: 0, g: 0, b: 0, alpha: 0 } })
        .png()
        .toBuffer();
      return { input };
    } catch (error) {
      // se reporta en el artefacto; el coordinador la cuenta como placeholder
      logger.warn("No se pudo escalar la imagen", { cardId: card.id, error: errorMessage(error) });
      return { input: placeholder(), error: errorMessage(error) };
    }
  }
}
