import { PDFDocument } from "pdf-lib";
import sharp from "sharp";
import type { ArtifactSinkPort, PdfBundlerPort } from "../../application/ports";
import type { ArtifactRef } from "../../domain/models";

export const PDF_DPI = 150;

const pxToPt = (px: number) => (px * 72) / PDF_DPI;

/** Un PDF con una pagina por artefacto, cada una del tamano de su imagen. */
export class PdfLibBundler implements PdfBundlerPort {
  constructor(private readonly sink: ArtifactSinkPort) {}

  async bundle(params: { artifacts: ArtifactRef[]; outputPath: string }): Promise<void> {
    const { artifacts, outputPath } = params;

    const doc = await PDFDocument.create();
    doc.setTitle("Coleccion de cartas");
    doc.setProducer("card-poster");

    const ordered = artifacts.slice().sort((a, b) => a.pageIndex - b.pageIndex);

    for (const artifact of ordered) {
      const raw = await this.sink.read(artifact.path);

      // pdf-lib solo embebe png/jpg; normalizamos a png
      const pngBytes = await sharp(raw).png().toBuffer();
      const image = await doc.embedPng(pngBytes);

      const pageW = pxToPt(artifact.widthPx);
      const pageH = pxToPt(artifact.heightPx);
      const page = doc.addPage([pageW, pageH]);
      page.drawImage(image, { x: 0, y: 0, width: pageW, height: pageH });
    }

    const pdfBytes = await doc.save();
    await this.sink.write(outputPath, pdfBytes);
  }
}
