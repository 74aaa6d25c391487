import { formatDepth } from "@coretag/assignment-kernel";
import type { LabelPayloadV1 } from "@coretag/contracts";

import type { LabelProfile } from "./label_profiles";

export const ELLIPSIS_CELL = "$\\cdots$";

const LATEX_SPECIALS: Readonly<Record<string, string>> = {
  "\\": "\\textbackslash{}",
  "{": "\\{",
  "}": "\\}",
  $: "\\$",
  "&": "\\&",
  "#": "\\#",
  "%": "\\%",
  _: "\\_",
  "~": "\\textasciitilde{}",
  "^": "\\textasciicircum{}"
};

export function escapeLatex(text: string): string {
  return text.replace(/[\\{}$&#%_~^]/g, (c) => LATEX_SPECIALS[c] ?? c);
}

/**
 * Keeps `markerKeep` cells at each end, with two ellipsis cells between them,
 * once there are more than `markerLimit` cells. Two ellipses keep the
 * two-column grid aligned.
 */
export function elideMarkers(cells: ReadonlyArray<string>, profile: LabelProfile): string[] {
  if (cells.length <= profile.markerLimit) return [...cells];
  return [
    ...cells.slice(0, profile.markerKeep),
    ELLIPSIS_CELL,
    ELLIPSIS_CELL,
    ...cells.slice(cells.length - profile.markerKeep)
  ];
}

/**
 * Two cells per row; an odd last cell leaves the right column empty.
 */
export function markerRows(cells: ReadonlyArray<string>): string[] {
  const rows: string[] = [];
  for (let i = 0; i < cells.length; i += 2) {
    const last = i + 2 >= cells.length;
    const row = i + 1 < cells.length ? `${cells[i]} & ${cells[i + 1]}` : `${cells[i]} &`;
    rows.push(last ? row : `${row} \\\\`);
  }
  return rows;
}

export type LabelTexInput = {
  payload: LabelPayloadV1;
  imageFileName: string; // resolved relative to the .tex file
  profile: LabelProfile;
  tagsEnabled: boolean;
};

export function renderLabelTex(input: LabelTexInput): string {
  const { payload: p, imageFileName, profile } = input;

  const title = escapeLatex([p.hole, p.box, formatDepth(p.starting_depth), formatDepth(p.ending_depth)].join(","));
  const position = !input.tagsEnabled
    ? ""
    : p.tag_at_sample_start
      ? "Samples starts at tags"
      : "Samples ends at tags";
  const cells = elideMarkers(
    p.markers.map((m) => escapeLatex(`${m.name},${formatDepth(m.depth)}`)),
    profile
  );

  const lines = [
    "\\documentclass{article}",
    "\\usepackage[export]{adjustbox}",
    "\\usepackage{float}",
    `\\usepackage[${profile.geometry}]{geometry}`,
    "\\usepackage{graphicx}",
    "\\usepackage{pdflscape}",
    "\\usepackage[scaled]{beramono}",
    "\\renewcommand*\\familydefault{\\ttdefault}",
    "\\usepackage[T1]{fontenc}",
    "\\begin{document}",
    "\\begin{landscape}",
    "\\noindent",
    `\\begin{minipage}{${profile.qrMinipageMm}mm}`,
    `\\includegraphics[width=${profile.qrSizeMm}mm, height=${profile.qrSizeMm}mm]{${imageFileName}}`,
    "\\end{minipage}",
    "\\hspace{-7.5mm}",
    `\\begin{minipage}{${profile.textMinipageMm}mm}`,
    "\\begin{adjustbox}{max width=\\textwidth}",
    "\\centering",
    "\\begin{tabular}{c c}",
    `\\multicolumn{2}{c}{\\large\\textbf{${title}}\\par} \\\\`,
    `\\multicolumn{2}{c}{\\large\\textbf{${position}}\\par} \\\\`,
    ...markerRows(cells),
    "\\end{tabular}",
    "\\end{adjustbox}",
    "\\end{minipage}",
    "\\end{landscape}",
    "\\end{document}"
  ];
  return lines.join("\n") + "\n";
}
