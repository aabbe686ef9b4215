// ──────────────────────────────────────────
// Charts: SVG → PNG for document embedding (sharp)
// ──────────────────────────────────────────

import sharp from 'sharp';
import { ChartRenderError, messageOf } from '../../shared/errors';
import { Rasterizer } from '../../shared/contracts';

// 2x the SVG's 72 dpi so the PNGs stay sharp when printed
const DENSITY = 144;

export const rasterize: Rasterizer = async (svg) => {
  try {
    return await sharp(Buffer.from(svg), { density: DENSITY }).png().toBuffer();
  } catch (err) {
    throw new ChartRenderError(`Chart rasterization failed: ${messageOf(err)}`, { cause: err });
  }
};
