/**
 * Image decoding and downsampling into terminal cells
 */

import sharp from 'sharp';
import { ImageDecodeFailed } from '../errors.js';
import type { Cell, GridSize, RenderGrid, RgbaImage } from '../types.js';
import { COMPONENTS, logDebug } from '../utils/logger.js';

/** Terminal cells are about twice as tall as they are wide */
export const CELL_ASPECT_RATIO = 2;

/** Rec. 601 luma weights */
const LUMA = { r: 0.299, g: 0.587, b: 0.114 } as const;

/**
 * Decode the first frame of an image file into raw RGBA
 *
 * @throws ImageDecodeFailed
 */
export async function decodeImage(imagePath: string): Promise<RgbaImage> {
  try {
    const { data, info } = await sharp(imagePath, { pages: 1 })
      .rotate()
      .ensureAlpha()
      .raw()
      .toBuffer({ resolveWithObject: true });

    logDebug(COMPONENTS.SAMPLER, `Decoded ${imagePath}: ${info.width}x${info.height}, ${info.channels} channels`);
    return { width: info.width, height: info.height, data: new Uint8Array(data.buffer, data.byteOffset, data.byteLength) };
  } catch (error) {
    throw new ImageDecodeFailed(imagePath, error);
  }
}

/**
 * Largest grid within bounds whose rendered shape matches the image,
 * compensating for tall character cells
 */
export function computeGridSize(
  image: Pick<RgbaImage, 'width' | 'height'>,
  bounds: GridSize,
  cellAspect: number = CELL_ASPECT_RATIO
): GridSize {
  const maxColumns = Math.max(1, Math.floor(bounds.columns));
  const maxRows = Math.max(1, Math.floor(bounds.rows));
  const aspect = (image.width * cellAspect) / image.height;

  let columns = maxColumns;
  let rows = Math.round(columns / aspect);
  if (rows > maxRows) {
    rows = maxRows;
    columns = Math.min(maxColumns, Math.round(rows * aspect));
  }

  return { columns: Math.max(1, columns), rows: Math.max(1, rows) };
}

/**
 * Block boundaries along one axis: floor(i * size / count), each block at
 * least one pixel wide
 */
function blockRange(index: number, count: number, size: number): [number, number] {
  const start = Math.min(size - 1, Math.floor((index * size) / count));
  const end = Math.max(start + 1, Math.floor(((index + 1) * size) / count));
  return [start, Math.min(end, size)];
}

function sampleBlock(image: RgbaImage, x0: number, x1: number, y0: number, y1: number): Cell {
  let r = 0;
  let g = 0;
  let b = 0;
  let a = 0;
  let luminance = 0;

  for (let y = y0; y < y1; y++) {
    let offset = (y * image.width + x0) * 4;
    for (let x = x0; x < x1; x++, offset += 4) {
      const pr = image.data[offset];
      const pg = image.data[offset + 1];
      const pb = image.data[offset + 2];
      const pa = image.data[offset + 3];
      r += pr;
      g += pg;
      b += pb;
      a += pa;
      luminance += ((LUMA.r * pr + LUMA.g * pg + LUMA.b * pb) / 255) * (pa / 255);
    }
  }

  const count = (x1 - x0) * (y1 - y0);
  return {
    luminance: Math.min(1, luminance / count),
    color: { r: Math.round(r / count), g: Math.round(g / count), b: Math.round(b / count) },
    alpha: a / (count * 255),
  };
}

/**
 * Partition the image into grid.columns x grid.rows blocks and average each
 */
export function sampleImage(image: RgbaImage, grid: GridSize): RenderGrid {
  if (image.width < 1 || image.height < 1) {
    throw new RangeError(`Cannot sample an empty image (${image.width}x${image.height})`);
  }

  const cells: Cell[] = [];
  for (let row = 0; row < grid.rows; row++) {
    const [y0, y1] = blockRange(row, grid.rows, image.height);
    for (let column = 0; column < grid.columns; column++) {
      const [x0, x1] = blockRange(column, grid.columns, image.width);
      cells.push(sampleBlock(image, x0, x1, y0, y1));
    }
  }

  return { columns: grid.columns, rows: grid.rows, cells };
}
