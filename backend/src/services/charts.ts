/**
 * charts.ts — SVG report charts
 *
 * Pure string builders, no DOM and no canvas:
 *   renderVolumeBarChart — total volume per ship
 *   renderCostPieChart   — cost share per substance for one ship
 * Output is a UTF-8 SVG document in a Buffer.
 */
import { safeDiv } from './helpers.ts';
import type { BreakdownRow, FleetCharts, ShipSummary } from '../types.ts';

const CHART_COLORS = [
  '#2563eb', '#16a34a', '#d97706', '#dc2626', '#7c3aed',
  '#0891b2', '#db2777', '#65a30d', '#ea580c', '#475569',
];
const FONT = 'font-family="system-ui, sans-serif"';

export const SVG_MIME = 'image/svg+xml';

export function escapeXml(s: string): string {
  return s
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

function fmt(n: number): string {
  return n.toLocaleString('en-US', { maximumFractionDigits: 2 });
}

function svgDoc(width: number, height: number, body: string[]): Buffer {
  return Buffer.from(
    `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">`
      + body.join('')
      + '</svg>',
    'utf-8',
  );
}

function assertAligned(labels: readonly string[], values: readonly number[]): void {
  if (labels.length !== values.length) {
    throw new Error(`Chart series misaligned: ${labels.length} labels, ${values.length} values`);
  }
}

// ═══ BAR CHART ═══

const BAR = { slot: 56, gap: 10, height: 360, padTop: 40, padBottom: 110, padLeft: 40, padRight: 20, minWidth: 420 };

export function renderVolumeBarChart(names: readonly string[], volumes: readonly number[], title = 'Volume by ship'): Buffer {
  assertAligned(names, volumes);
  const width = Math.max(BAR.minWidth, BAR.padLeft + BAR.padRight + names.length * BAR.slot);
  const plotH = BAR.height - BAR.padTop - BAR.padBottom;
  const baseline = BAR.padTop + plotH;
  const max = volumes.reduce((m, v) => Math.max(m, v), 0);

  const body: string[] = [
    `<text x="${width / 2}" y="24" text-anchor="middle" ${FONT} font-size="16">${escapeXml(title)}</text>`,
    `<line x1="${BAR.padLeft}" y1="${baseline}" x2="${width - BAR.padRight}" y2="${baseline}" stroke="#94a3b8"/>`,
  ];

  names.forEach((name, i) => {
    const v = volumes[i] ?? 0;
    const h = max > 0 ? (v / max) * plotH : 0;
    const x = BAR.padLeft + i * BAR.slot + BAR.gap / 2;
    const w = BAR.slot - BAR.gap;
    const cx = x + w / 2;
    body.push(
      `<rect class="bar" x="${x}" y="${(baseline - h).toFixed(2)}" width="${w}" height="${h.toFixed(2)}" fill="${CHART_COLORS[0]}"/>`,
      `<text x="${cx}" y="${(baseline - h - 4).toFixed(2)}" text-anchor="middle" ${FONT} font-size="10">${fmt(v)}</text>`,
      `<text x="${cx}" y="${baseline + 12}" text-anchor="end" transform="rotate(-45 ${cx} ${baseline + 12})" ${FONT} font-size="11">${escapeXml(name)}</text>`,
    );
  });

  return svgDoc(width, BAR.height, body);
}

// ═══ PIE CHART ═══

const PIE = { size: 280, radius: 110, legendWidth: 200, legendRow: 18 };

function point(cx: number, cy: number, r: number, angle: number): [number, number] {
  return [cx + r * Math.cos(angle), cy + r * Math.sin(angle)];
}

function polar(cx: number, cy: number, r: number, angle: number): string {
  const [x, y] = point(cx, cy, r, angle);
  return `${x.toFixed(2)} ${y.toFixed(2)}`;
}

export function renderCostPieChart(substances: readonly string[], costs: readonly number[], title = 'Cost by substance'): Buffer {
  assertAligned(substances, costs);
  const slices = substances
    .map((name, i) => ({ name, cost: costs[i] ?? 0, color: CHART_COLORS[i % CHART_COLORS.length] ?? '#64748b' }))
    .filter(s => s.cost > 0);
  const total = slices.reduce((s, x) => s + x.cost, 0);

  const width = PIE.size + PIE.legendWidth;
  const height = Math.max(PIE.size + 30, 40 + slices.length * PIE.legendRow);
  const cx = PIE.size / 2;
  const cy = PIE.size / 2 + 30;
  const r = PIE.radius;

  const body: string[] = [
    `<text x="${width / 2}" y="20" text-anchor="middle" ${FONT} font-size="15">${escapeXml(title)}</text>`,
  ];

  if (total <= 0) {
    body.push(
      `<circle cx="${cx}" cy="${cy}" r="${r}" fill="#e2e8f0"/>`,
      `<text x="${cx}" y="${cy}" text-anchor="middle" ${FONT} font-size="12">No cost recorded</text>`,
    );
    return svgDoc(width, height, body);
  }

  let angle = -Math.PI / 2;
  for (const s of slices) {
    const share = s.cost / total;
    const end = angle + share * 2 * Math.PI;
    if (slices.length === 1) {
      body.push(`<circle class="slice" cx="${cx}" cy="${cy}" r="${r}" fill="${s.color}"/>`);
    } else {
      const largeArc = share > 0.5 ? 1 : 0;
      body.push(
        `<path class="slice" d="M ${cx} ${cy} L ${polar(cx, cy, r, angle)} A ${r} ${r} 0 ${largeArc} 1 ${polar(cx, cy, r, end)} Z" fill="${s.color}" stroke="#fff"/>`,
      );
    }
    const mid = (angle + end) / 2;
    const [lx, ly]: [number, number] = slices.length === 1 ? [cx, cy] : point(cx, cy, r * 0.65, mid);
    body.push(
      `<text class="pct" x="${lx.toFixed(2)}" y="${ly.toFixed(2)}" text-anchor="middle" ${FONT} font-size="12" fill="#fff">${safeDiv(s.cost * 100, total, 1).toFixed(1)}%</text>`,
    );
    angle = end;
  }

  slices.forEach((s, i) => {
    const y = 40 + i * PIE.legendRow;
    body.push(
      `<rect x="${PIE.size + 10}" y="${y}" width="12" height="12" fill="${s.color}"/>`,
      `<text x="${PIE.size + 28}" y="${y + 10}" ${FONT} font-size="12">${escapeXml(s.name)} (${fmt(s.cost)})</text>`,
    );
  });

  return svgDoc(width, height, body);
}

// ═══ FLEET ═══

/**
 * Bar chart over every summary row, plus one pie per ship with a recorded
 * cost. Ships with no breakdown rows, or only zero-cost rows, get no pie.
 */
export function renderFleetCharts(summary: readonly ShipSummary[], breakdown: readonly BreakdownRow[]): FleetCharts {
  const volumeByShip = renderVolumeBarChart(summary.map(s => s.shipName), summary.map(s => s.totalVolume));

  const grouped = new Map<string, BreakdownRow[]>();
  for (const row of breakdown) {
    const rows = grouped.get(row.shipName) ?? [];
    rows.push(row);
    grouped.set(row.shipName, rows);
  }

  const costByShip = new Map<string, Buffer>();
  for (const [shipName, rows] of grouped) {
    if (!rows.some(r => r.totalCost > 0)) continue;
    costByShip.set(shipName, renderCostPieChart(rows.map(r => r.substance), rows.map(r => r.totalCost), shipName));
  }

  return { volumeByShip, costByShip };
}

export function toDataUri(svg: Buffer): string {
  return `data:${SVG_MIME};base64,${svg.toString('base64')}`;
}
