import fs from "fs";
import path from "path";
import type { NutritionSummary, RenderInput, WeeklySummary } from "../types.js";

const WIDTH = 480;
const HEIGHT = 320;
const MARGIN = { top: 40, right: 20, bottom: 50, left: 50 };
const COLORS = { consumed: "#4e79a7", target: "#bab0ac", line: "#59a14f", goal: "#e15759" };

const LABELS: Record<string, string> = {
  kcal: "Calories (kcal/10)",
  protein_g: "Protein (g)",
  fat_g: "Fat (g)",
  carbs_g: "Carbs (g)",
};

const escapeXml = (s: string) =>
  s.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;").replace(/"/g, "&quot;");

const fmt = (n: number) => (Math.round(n * 10) / 10).toString();

function frame(title: string, body: string[]): string {
  return [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${WIDTH}" height="${HEIGHT}" viewBox="0 0 ${WIDTH} ${HEIGHT}" font-family="sans-serif" font-size="11">`,
    `<rect width="${WIDTH}" height="${HEIGHT}" fill="#ffffff"/>`,
    `<text x="${WIDTH / 2}" y="22" text-anchor="middle" font-size="14">${escapeXml(title)}</text>`,
    ...body,
    "</svg>",
    "",
  ].join("\n");
}

// Grouped bars, consumed next to target. kcal is drawn at 1/10 scale to share the axis with grams.
export function dailyChart(date: string, summary: NutritionSummary): string {
  const plotW = WIDTH - MARGIN.left - MARGIN.right;
  const plotH = HEIGHT - MARGIN.top - MARGIN.bottom;
  const scaled = summary.rows.map((row) => {
    const k = row.nutrient === "kcal" ? 0.1 : 1;
    return { row, consumed: row.consumed * k, target: row.target * k };
  });
  const max = Math.max(1, ...scaled.flatMap((s) => [s.consumed, s.target]));
  const group = plotW / scaled.length;
  const bar = group / 3;
  const baseline = MARGIN.top + plotH;

  const body: string[] = [
    `<line x1="${MARGIN.left}" y1="${baseline}" x2="${MARGIN.left + plotW}" y2="${baseline}" stroke="#333"/>`,
  ];
  scaled.forEach((s, i) => {
    const x = MARGIN.left + i * group + bar / 2;
    const hc = (s.consumed / max) * plotH;
    const ht = (s.target / max) * plotH;
    body.push(
      `<rect x="${fmt(x)}" y="${fmt(baseline - hc)}" width="${fmt(bar)}" height="${fmt(hc)}" fill="${COLORS.consumed}"/>`,
      `<rect x="${fmt(x + bar)}" y="${fmt(baseline - ht)}" width="${fmt(bar)}" height="${fmt(ht)}" fill="${COLORS.target}"/>`,
      `<text x="${fmt(x + bar)}" y="${baseline + 16}" text-anchor="middle">${escapeXml(LABELS[s.row.nutrient] ?? s.row.nutrient)}</text>`,
      `<text x="${fmt(x + bar / 2)}" y="${fmt(baseline - hc - 4)}" text-anchor="middle">${fmt(s.row.consumed)}</text>`
    );
  });
  body.push(
    `<text x="${MARGIN.left}" y="${HEIGHT - 10}" fill="${COLORS.consumed}">■ Consumed</text>`,
    `<text x="${MARGIN.left + 90}" y="${HEIGHT - 10}" fill="${COLORS.target}">■ Target</text>`
  );
  return frame(`Macro Summary ${date}${summary.achieved ? " ✓" : ""}`, body);
}

export function weeklyChart(summary: WeeklySummary): string {
  const plotW = WIDTH - MARGIN.left - MARGIN.right;
  const plotH = HEIGHT - MARGIN.top - MARGIN.bottom;
  const baseline = MARGIN.top + plotH;
  const max = Math.max(1, summary.targetKcal, ...summary.days.map((d) => d.kcal)) * 1.1;
  const step = summary.days.length > 1 ? plotW / (summary.days.length - 1) : 0;
  const y = (kcal: number) => baseline - (kcal / max) * plotH;

  const points = summary.days.map((d, i) => `${fmt(MARGIN.left + i * step)},${fmt(y(d.kcal))}`);
  const body: string[] = [
    `<line x1="${MARGIN.left}" y1="${baseline}" x2="${MARGIN.left + plotW}" y2="${baseline}" stroke="#333"/>`,
    `<line x1="${MARGIN.left}" y1="${fmt(y(summary.targetKcal))}" x2="${MARGIN.left + plotW}" y2="${fmt(y(summary.targetKcal))}" stroke="${COLORS.goal}" stroke-dasharray="4 3"/>`,
    `<polyline points="${points.join(" ")}" fill="none" stroke="${COLORS.line}" stroke-width="2"/>`,
  ];
  summary.days.forEach((d, i) => {
    const x = MARGIN.left + i * step;
    body.push(
      `<circle cx="${fmt(x)}" cy="${fmt(y(d.kcal))}" r="3" fill="${COLORS.line}"/>`,
      `<text x="${fmt(x)}" y="${baseline + 16}" text-anchor="middle">${escapeXml(d.date.slice(5))}</text>`
    );
  });
  return frame(`Calories, last ${summary.days.length} days (${summary.end})`, body);
}

/**
 * Writes the SVG chart for a report and returns its path.
 */
export class ReportRenderer {
  constructor(private readonly outDir: string) {}

  render(input: RenderInput): string {
    fs.mkdirSync(this.outDir, { recursive: true });
    const [file, svg] =
      input.kind === "daily"
        ? [`daily_${input.date}.svg`, dailyChart(input.date, input.summary)]
        : [`weekly_${input.summary.end}.svg`, weeklyChart(input.summary)];
    const outPath = path.join(this.outDir, file);
    fs.writeFileSync(outPath, svg, "utf-8");
    return outPath;
  }
}
