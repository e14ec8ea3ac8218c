import type { RGB } from '../gfx/palette.js';

// RGBA8888, row-major, 4 bytes per pixel.
export type RGBAImage = { width: number; height: number; pixels: Uint8Array };

export function createImage(width: number, height: number, fill: RGB = [0, 0, 0]): RGBAImage {
  const pixels = new Uint8Array(width * height * 4);
  for (let i = 0; i < pixels.length; i += 4) {
    pixels[i] = fill[0];
    pixels[i + 1] = fill[1];
    pixels[i + 2] = fill[2];
    pixels[i + 3] = 255;
  }
  return { width, height, pixels };
}

export function setPixel(img: RGBAImage, x: number, y: number, color: RGB): void {
  if (x < 0 || y < 0 || x >= img.width || y >= img.height) return;
  const i = (y * img.width + x) * 4;
  img.pixels[i] = color[0];
  img.pixels[i + 1] = color[1];
  img.pixels[i + 2] = color[2];
  img.pixels[i + 3] = 255;
}

// Copy src into dst at (dstX, dstY), clipping to dst bounds.
export function blitImage(dst: RGBAImage, dstX: number, dstY: number, src: RGBAImage): void {
  for (let y = 0; y < src.height; y++) {
    const ty = dstY + y;
    if (ty < 0 || ty >= dst.height) continue;
    for (let x = 0; x < src.width; x++) {
      const tx = dstX + x;
      if (tx < 0 || tx >= dst.width) continue;
      const si = (y * src.width + x) * 4;
      const di = (ty * dst.width + tx) * 4;
      dst.pixels[di] = src.pixels[si]!;
      dst.pixels[di + 1] = src.pixels[si + 1]!;
      dst.pixels[di + 2] = src.pixels[si + 2]!;
      dst.pixels[di + 3] = src.pixels[si + 3]!;
    }
  }
}
