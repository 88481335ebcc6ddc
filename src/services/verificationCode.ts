import * as QRCode from "qrcode";

export interface VerificationPayloadInput {
  certificateId: string;
  traineeName: string;
  trainingTitle: string;
  completionDate: string;
  verifyUrl?: string;
}

/** Square module grid of a 2-D barcode, without quiet zone. */
export interface VerificationMatrix {
  size: number;
  isDark(row: number, col: number): boolean;
}

export type VerificationCodeEncoder = (payload: string) => VerificationMatrix;

/**
 * Text carried by the QR code. Holds enough to check a printed certificate
 * offline; the URL line is only present when a verification endpoint is
 * configured.
 */
export function buildVerificationPayload(input: VerificationPayloadInput): string {
  const lines = [
    `Certificate ID: ${input.certificateId}`,
    `Trainee: ${input.traineeName}`,
    `Training: ${input.trainingTitle}`,
    `Completed: ${input.completionDate}`,
  ];
  if (input.verifyUrl) {
    lines.push(`Verify: ${input.verifyUrl.replace(/\/+$/, "")}/${encodeURIComponent(input.certificateId)}`);
  }
  return lines.join("\n");
}

// Throws when the payload does not fit in a QR code at this correction level.
export const encodeQrMatrix: VerificationCodeEncoder = (payload) => {
  const { modules } = QRCode.create(payload, { errorCorrectionLevel: "M" });
  return {
    size: modules.size,
    isDark: (row, col) => Boolean(modules.get(row, col)),
  };
};
