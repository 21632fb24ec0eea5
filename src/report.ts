import fs from 'fs';
import path from 'path';
import ejs from 'ejs';
import type { Recommendation } from './types';
import { TEMPLATES_DIR } from './paths';

const MODE_LABELS: Record<Recommendation['mode'], string> = {
  title: 'Similar titles',
  year: 'Released in year',
  text: 'Matching description',
  genre: 'Genre contains',
};

export function formatScore(score?: number): string {
  return score === undefined ? '' : score.toFixed(3);
}

/** Renders a recommendation into `<outDir>/recommendations.html` next to its stylesheet. */
export async function renderReport(rec: Recommendation, outDir = 'out/report', generatedAt = new Date()): Promise<string> {
  const tpl = await fs.promises.readFile(path.join(TEMPLATES_DIR, 'report.ejs'), 'utf-8');
  const html = ejs.render(tpl, {
    generatedAt: generatedAt.toISOString(),
    modeLabel: MODE_LABELS[rec.mode],
    rec,
    formatScore,
  });

  await fs.promises.mkdir(outDir, { recursive: true });
  const outFile = path.join(outDir, 'recommendations.html');
  await fs.promises.writeFile(outFile, html, 'utf-8');
  await fs.promises.copyFile(path.join(TEMPLATES_DIR, 'report.css'), path.join(outDir, 'report.css'));
  return outFile;
}
