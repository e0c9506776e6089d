/**
 * Forecast Fusion — Chart Rendering
 *
 * Server-side render of the chart to SVG, then rasterized to PNG with sharp.
 * Identical models give identical SVG; pixels can still differ with the fonts
 * installed on the host.
 */

import { renderToStaticMarkup } from 'react-dom/server';
import sharp from 'sharp';
import { ForecastChart } from './ForecastChart';
import type { ChartModel } from './model';

const TITLE_HEIGHT = 40;

export function escapeXml(text: string): string {
    return text
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;')
        .replace(/'/g, '&apos;');
}

/**
 * Pull the chart surface out of the wrapper markup.
 */
export function extractSvg(markup: string): string {
    const start = markup.indexOf('<svg');
    const end = markup.lastIndexOf('</svg>');
    if (start < 0 || end < start) {
        throw new Error('Chart markup contains no <svg> element');
    }
    return markup.slice(start, end + '</svg>'.length);
}

export function renderChartSvg(model: ChartModel): string {
    const surface = extractSvg(renderToStaticMarkup(<ForecastChart model={model} />));
    const width = model.width;
    const height = model.height + TITLE_HEIGHT;

    return [
        `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">`,
        '<rect width="100%" height="100%" fill="#ffffff"/>',
        `<text x="${width / 2}" y="26" text-anchor="middle" font-family="sans-serif" font-size="18">${escapeXml(model.title)}</text>`,
        `<g transform="translate(0,${TITLE_HEIGHT})">${surface}</g>`,
        '</svg>'
    ].join('');
}

export async function renderChartPng(model: ChartModel): Promise<Uint8Array> {
    const png = await sharp(Buffer.from(renderChartSvg(model))).png().toBuffer();
    return new Uint8Array(png);
}

export type ChartRenderer = (model: ChartModel) => Promise<Uint8Array>;
