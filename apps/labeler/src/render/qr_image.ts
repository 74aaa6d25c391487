import * as QRCode from "qrcode";

export type QrWriter = (filePath: string, payload: string) => Promise<void>;

export const writeQrPng: QrWriter = async (filePath, payload) => {
  await QRCode.toFile(filePath, payload, { type: "png", errorCorrectionLevel: "M", margin: 4 });
};
