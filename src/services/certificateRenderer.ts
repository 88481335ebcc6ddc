import PDFDocument from "pdfkit";
import { RenderingFailedError, isCertificateError } from "../shared/errors";
import { logger } from "../shared/logger";
import {
  buildVerificationPayload,
  encodeQrMatrix,
  type VerificationCodeEncoder,
  type VerificationMatrix,
} from "./verificationCode";

export interface CertificateRenderInput {
  certificateId: string;
  traineeName: string;
  trainingTitle: string;
  /** YYYY-MM-DD */
  completionDate: string;
  venue: string;
  durationLabel: string;
}

export interface RenderedCertificate {
  pdf: Buffer;
  verificationCodeEmbedded: boolean;
}

export interface CertificateRenderOptions {
  issuerName?: string;
  programName?: string;
  verifyUrl?: string;
  /** TrueType font used for all text; without it the built-in Helvetica is used. */
  fontPath?: string;
  boldFontPath?: string;
  encodeVerificationCode?: VerificationCodeEncoder;
}

export type CertificateRenderer = (input: CertificateRenderInput) => Promise<RenderedCertificate>;

// ─── Layout ─────────────────────────────────────────────────────────────────

const COLORS = {
  background: "#fbfaf4",
  border: "#1a365d",
  accent: "#2c7a7b",
  heading: "#1a365d",
  body: "#2d3748",
  muted: "#718096",
};

const QR_SIZE = 112;
const QR_QUIET_MODULES = 2;
const METADATA_MIN_Y = 345;
const METADATA_LINE_GAP = 6;

// Helvetica is WinAnsi-encoded; anything outside printable Latin-1 comes out as garbage.
const BUILT_IN_FONT_TEXT = /^[\x20-\x7E\u00A0-\u00FF]*$/;

interface FontSet {
  regular: string;
  bold: string;
}

export function formatCompletionDate(completionDate: string): string {
  return new Date(`${completionDate}T00:00:00.000Z`).toLocaleDateString("en-GB", {
    day: "numeric",
    month: "long",
    year: "numeric",
    timeZone: "UTC",
  });
}

function assertRenderable(fields: Record<string, string>): void {
  for (const [field, value] of Object.entries(fields)) {
    if (!BUILT_IN_FONT_TEXT.test(value)) {
      throw new RenderingFailedError(
        `${field} contains characters the built-in certificate font cannot render; configure CERTIFICATE_FONT_PATH`
      );
    }
  }
}

function registerFonts(doc: PDFKit.PDFDocument, options: CertificateRenderOptions): FontSet {
  if (!options.fontPath) {
    return { regular: "Helvetica", bold: "Helvetica-Bold" };
  }
  doc.registerFont("certificate-regular", options.fontPath);
  doc.registerFont("certificate-bold", options.boldFontPath ?? options.fontPath);
  return { regular: "certificate-regular", bold: "certificate-bold" };
}

function drawFrame(doc: PDFKit.PDFDocument): void {
  const { width, height } = doc.page;
  doc.rect(0, 0, width, height).fill(COLORS.background);
  doc.rect(24, 24, width - 48, height - 48).lineWidth(3).stroke(COLORS.border);
  doc.rect(34, 34, width - 68, height - 68).lineWidth(0.75).stroke(COLORS.accent);
}

function drawVerificationCode(doc: PDFKit.PDFDocument, matrix: VerificationMatrix, x: number, y: number): void {
  const moduleSize = QR_SIZE / (matrix.size + QR_QUIET_MODULES * 2);
  const origin = QR_QUIET_MODULES * moduleSize;

  doc.rect(x, y, QR_SIZE, QR_SIZE).fill("#ffffff");
  for (let row = 0; row < matrix.size; row += 1) {
    for (let col = 0; col < matrix.size; col += 1) {
      if (matrix.isDark(row, col)) {
        doc.rect(x + origin + col * moduleSize, y + origin + row * moduleSize, moduleSize, moduleSize);
      }
    }
  }
  doc.fill("#000000");
}

/** The lines of the metadata block, in print order. */
export function certificateMetadataLines(input: CertificateRenderInput): string[] {
  return [
    `Completed on: ${formatCompletionDate(input.completionDate)}`,
    `Venue: ${input.venue}`,
    `Duration: ${input.durationLabel}`,
    `Certificate ID: ${input.certificateId}`,
  ];
}

/**
 * Prints the lines top to bottom, each starting below the previous one so
 * that wrapped venue or duration text never overlaps the next line.
 * Returns the y position of every line.
 */
export function drawMetadataBlock(
  doc: PDFKit.PDFDocument,
  lines: string[],
  x: number,
  y: number,
  width: number
): number[] {
  const positions: number[] = [];
  let lineY = y;
  for (const line of lines) {
    positions.push(lineY);
    doc.text(line, x, lineY, { width });
    lineY = doc.y + METADATA_LINE_GAP;
  }
  return positions;
}

function compose(
  doc: PDFKit.PDFDocument,
  input: CertificateRenderInput,
  options: CertificateRenderOptions,
  fonts: FontSet,
  matrix: VerificationMatrix | null
): void {
  const { width, height } = doc.page;
  const textWidth = width - 160;

  drawFrame(doc);

  doc
    .fillColor(COLORS.heading)
    .font(fonts.bold)
    .fontSize(16)
    .text((options.issuerName ?? "Ministry of Health").toUpperCase(), 80, 58, { width: textWidth, align: "center" });
  doc
    .fillColor(COLORS.muted)
    .font(fonts.regular)
    .fontSize(11)
    .text(options.programName ?? "MNCH Training Program", 80, 80, { width: textWidth, align: "center" });

  doc
    .fillColor(COLORS.heading)
    .font(fonts.bold)
    .fontSize(30)
    .text("CERTIFICATE OF COMPLETION", 80, 108, { width: textWidth, align: "center" });
  doc
    .moveTo(width / 2 - 150, 152)
    .lineTo(width / 2 + 150, 152)
    .lineWidth(1)
    .stroke(COLORS.accent);

  doc
    .fillColor(COLORS.body)
    .font(fonts.regular)
    .fontSize(14)
    .text("This is to certify that", 80, 172, { width: textWidth, align: "center" });
  doc
    .fillColor(COLORS.heading)
    .font(fonts.bold)
    .fontSize(26)
    .text(input.traineeName, 80, 196, { width: textWidth, align: "center" });
  doc
    .fillColor(COLORS.body)
    .font(fonts.regular)
    .fontSize(14)
    .text("has successfully completed the training", 80, doc.y + 10, { width: textWidth, align: "center" });
  doc
    .fillColor(COLORS.heading)
    .font(fonts.bold)
    .fontSize(20)
    .text(input.trainingTitle, 80, doc.y + 10, { width: textWidth, align: "center" });

  const metadataY = Math.max(doc.y + 24, METADATA_MIN_Y);
  doc.fillColor(COLORS.body).font(fonts.regular).fontSize(12);
  drawMetadataBlock(doc, certificateMetadataLines(input), 110, metadataY, width - 380);

  const qrX = width - QR_SIZE - 110;
  if (matrix) {
    drawVerificationCode(doc, matrix, qrX, metadataY - 8);
    doc
      .fillColor(COLORS.muted)
      .font(fonts.regular)
      .fontSize(8)
      .text("Scan to verify", qrX, metadataY + QR_SIZE - 2, { width: QR_SIZE, align: "center" });
  }

  const footer = options.verifyUrl
    ? `Verify this certificate at ${options.verifyUrl}`
    : "Quote the certificate ID to the issuing office to verify this certificate";
  doc
    .fillColor(COLORS.muted)
    .font(fonts.regular)
    .fontSize(8)
    .text(footer, 80, height - 58, { width: textWidth, align: "center" });
}

function encodeOrSkip(input: CertificateRenderInput, options: CertificateRenderOptions): VerificationMatrix | null {
  const encode = options.encodeVerificationCode ?? encodeQrMatrix;
  try {
    return encode(
      buildVerificationPayload({
        certificateId: input.certificateId,
        traineeName: input.traineeName,
        trainingTitle: input.trainingTitle,
        completionDate: input.completionDate,
        verifyUrl: options.verifyUrl,
      })
    );
  } catch (err) {
    logger.warn({
      msg: "Verification code skipped",
      certificateId: input.certificateId,
      error: err instanceof Error ? err.message : String(err),
    });
    return null;
  }
}

// ─── Render ─────────────────────────────────────────────────────────────────

/**
 * Renders a single-page A4 landscape certificate. The output depends only on
 * the input: the PDF creation date is the completion date, so the same input
 * yields the same bytes with the built-in fonts.
 */
export function renderCertificate(
  input: CertificateRenderInput,
  options: CertificateRenderOptions = {}
): Promise<RenderedCertificate> {
  return new Promise((resolve, reject) => {
    try {
      if (!options.fontPath) {
        assertRenderable({
          traineeName: input.traineeName,
          trainingTitle: input.trainingTitle,
          venue: input.venue,
          durationLabel: input.durationLabel,
          issuerName: options.issuerName ?? "",
          programName: options.programName ?? "",
        });
      }

      const matrix = encodeOrSkip(input, options);

      const doc = new PDFDocument({
        size: "A4",
        layout: "landscape",
        margins: { top: 36, bottom: 20, left: 36, right: 36 },
        info: {
          Title: `Certificate of Completion - ${input.trainingTitle}`,
          Author: options.issuerName ?? "Ministry of Health",
          Subject: input.certificateId,
          Creator: options.programName ?? "MNCH Training Program",
          CreationDate: new Date(`${input.completionDate}T00:00:00.000Z`),
        },
      });

      const chunks: Buffer[] = [];
      doc.on("data", (chunk: Buffer) => chunks.push(chunk));
      doc.on("end", () => resolve({ pdf: Buffer.concat(chunks), verificationCodeEmbedded: matrix !== null }));
      doc.on("error", (err: Error) => reject(new RenderingFailedError("certificate rendering failed", { cause: err })));

      const fonts = registerFonts(doc, options);
      compose(doc, input, options, fonts, matrix);
      doc.end();
    } catch (err) {
      reject(isCertificateError(err) ? err : new RenderingFailedError("certificate rendering failed", { cause: err }));
    }
  });
}

export function createCertificateRenderer(options: CertificateRenderOptions = {}): CertificateRenderer {
  return (input) => renderCertificate(input, options);
}
