import { describe, it, expect } from 'vitest';
import {
  escapeXml, renderCostPieChart, renderFleetCharts, renderVolumeBarChart, toDataUri,
} from '../services/charts.ts';
import type { BreakdownRow, ShipSummary } from '../types.ts';

function count(haystack: string, needle: string): number {
  return haystack.split(needle).length - 1;
}

describe('renderVolumeBarChart', () => {
  it('draws one bar per ship', () => {
    const svg = renderVolumeBarChart(['Vega', 'Altair', 'Castor'], [10, 0, 4]).toString('utf-8');
    expect(svg.startsWith('<svg xmlns="http://www.w3.org/2000/svg"')).toBe(true);
    expect(count(svg, '<rect class="bar"')).toBe(3);
    expect(svg).toContain('>Volume by ship</text>');
  });

  it('escapes ship names', () => {
    const svg = renderVolumeBarChart(['A & B <1>'], [1]).toString('utf-8');
    expect(svg).toContain('A &amp; B &lt;1&gt;');
  });

  it('rejects misaligned series', () => {
    expect(() => renderVolumeBarChart(['Vega'], [1, 2])).toThrow('Chart series misaligned: 1 labels, 2 values');
  });
});

describe('renderCostPieChart', () => {
  it('labels each slice with its percentage share', () => {
    const svg = renderCostPieChart(['Sewage', 'Water'], [50, 150]).toString('utf-8');
    expect(count(svg, '<path class="slice"')).toBe(2);
    expect(svg).toContain('>25.0%</text>');
    expect(svg).toContain('>75.0%</text>');
  });

  it('rounds shares to one decimal', () => {
    const svg = renderCostPieChart(['A', 'B', 'C'], [1, 1, 1]).toString('utf-8');
    expect(count(svg, '>33.3%</text>')).toBe(3);
  });

  it('draws a full circle for a single substance', () => {
    const svg = renderCostPieChart(['Water'], [80]).toString('utf-8');
    expect(count(svg, '<circle class="slice"')).toBe(1);
    expect(svg).toContain('>100.0%</text>');
  });

  it('leaves zero-cost substances out of the pie', () => {
    const svg = renderCostPieChart(['Sludge', 'Water'], [0, 10]).toString('utf-8');
    expect(svg).not.toContain('Sludge');
  });

  it('shows a placeholder when nothing has a cost', () => {
    const svg = renderCostPieChart(['Sludge'], [0]).toString('utf-8');
    expect(svg).toContain('>No cost recorded</text>');
    expect(svg).not.toContain('class="slice"');
  });
});

describe('renderFleetCharts', () => {
  const summary: ShipSummary[] = [
    { shipId: 2, shipName: 'Altair', operationCount: 1, totalVolume: 0, totalCost: 25, substances: ['Sludge'], firstDate: '2025-02-01', lastDate: '2025-02-01' },
    { shipId: 3, shipName: 'Castor', operationCount: 0, totalVolume: 0, totalCost: 0, substances: [], firstDate: null, lastDate: null },
  ];
  const breakdown: BreakdownRow[] = [
    { shipId: 2, shipName: 'Altair', pollutantId: 3, substance: 'Sludge', totalVolume: 0, totalCost: 25 },
  ];

  it('renders one pie per ship in the breakdown, none for the others', () => {
    const charts = renderFleetCharts(summary, breakdown);
    expect([...charts.costByShip.keys()]).toEqual(['Altair']);
    expect(count(charts.volumeByShip.toString('utf-8'), '<rect class="bar"')).toBe(2);
  });

  it('skips the pie for a ship whose rows carry volume but no cost', () => {
    const charts = renderFleetCharts(summary, [
      ...breakdown,
      { shipId: 3, shipName: 'Castor', pollutantId: 1, substance: 'Water', totalVolume: 12, totalCost: 0 },
    ]);
    expect([...charts.costByShip.keys()]).toEqual(['Altair']);
  });
});

describe('helpers', () => {
  it('escapeXml covers markup and quotes', () => {
    expect(escapeXml(`<a href="x">'&'</a>`)).toBe('&lt;a href=&quot;x&quot;&gt;&apos;&amp;&apos;&lt;/a&gt;');
  });

  it('toDataUri base64-encodes the document', () => {
    expect(toDataUri(Buffer.from('<svg/>'))).toBe(`data:image/svg+xml;base64,${Buffer.from('<svg/>').toString('base64')}`);
  });
});
