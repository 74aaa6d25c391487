import { UnsupportedLabelSizeError } from "../errors";

// DYMO LabelWriter stock. Sizes are in millimetres; the page is set in
// landscape so the QR code sits left of the text.
export type LabelProfile = {
  size: string;
  paper: string; // print-settings paper name
  geometry: string; // geometry package options
  qrMinipageMm: number;
  qrSizeMm: number;
  textMinipageMm: number;
  markerLimit: number; // more markers than this are elided
  markerKeep: number; // kept at each end when elided
};

const PROFILES: Readonly<Record<string, LabelProfile>> = {
  // 30252 Address: 28 x 89
  small: {
    size: "small",
    paper: "30252 Address",
    geometry: "margin=0mm, left=1mm, right=1mm, top=4mm, bottom=4mm, paperwidth=28mm, paperheight=89mm",
    qrMinipageMm: 30,
    qrSizeMm: 25,
    textMinipageMm: 50,
    markerLimit: 10,
    markerKeep: 4
  },
  // 30323 Shipping: 59 x 102
  large: {
    size: "large",
    paper: "30323 Shipping",
    geometry: "margin=0mm, left=4mm, right=1mm, top=1mm, bottom=1mm, paperwidth=59mm, paperheight=102mm",
    qrMinipageMm: 55,
    qrSizeMm: 50,
    textMinipageMm: 45,
    markerLimit: 26,
    markerKeep: 12
  }
};

export const LABEL_SIZES: ReadonlyArray<string> = Object.keys(PROFILES);

/**
 * Case-insensitive. Unknown sizes fail; there is no fallback stock.
 */
export function resolveLabelProfile(labelSize: string): LabelProfile {
  const key = labelSize.trim().toLowerCase();
  const profile = Object.prototype.hasOwnProperty.call(PROFILES, key) ? PROFILES[key] : undefined;
  if (!profile) throw new UnsupportedLabelSizeError(labelSize, LABEL_SIZES);
  return profile;
}
