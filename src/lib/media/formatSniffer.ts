// -----------------------------------------------------------------------------
// File format sniffing by magic bytes (file-type).
// Telegram's declared MIME types and file names are not trusted for the
// saved extension; the downloaded bytes are.
// -----------------------------------------------------------------------------

import { fileTypeFromFile } from "file-type";

export interface DetectedFormat {
  ext: string;
  mime: string;
}

export interface FormatSniffer {
  sniff(filePath: string): Promise<DetectedFormat | undefined>;
}

export const fileTypeSniffer: FormatSniffer = {
  async sniff(filePath) {
    const detected = await fileTypeFromFile(filePath);
    return detected ? { ext: detected.ext, mime: detected.mime } : undefined;
  },
};
