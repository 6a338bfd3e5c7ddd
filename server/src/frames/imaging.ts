import sharp from 'sharp';

export interface FrameSize {
  width: number;
  height: number;
}

export interface FrameImaging {
  /** Scales a captured image to exactly `size`, ignoring its aspect ratio. */
  fit(image: Buffer, size: FrameSize): Promise<Buffer>;
  /** A solid frame of `size` carrying a visible `label`. */
  placeholder(size: FrameSize, label: string): Promise<Buffer>;
}

function escapeXml(text: string): string {
  return text.replace(/[<>&'"]/g, (char) => `&#${char.charCodeAt(0)};`);
}

function labelSvg({ width, height }: FrameSize, label: string): Buffer {
  const fontSize = Math.max(12, Math.round(height / 12));
  return Buffer.from(
    `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}">` +
      `<text x="${Math.round(width * 0.04)}" y="${Math.round(height / 2)}" ` +
      `font-family="sans-serif" font-size="${fontSize}" font-weight="bold" fill="#ff0000">` +
      `${escapeXml(label)}</text></svg>`,
  );
}

export function createSharpImaging(quality: number): FrameImaging {
  return {
    async fit(image, { width, height }) {
      return sharp(image).resize(width, height, { fit: 'fill' }).jpeg({ quality }).toBuffer();
    },
    async placeholder(size, label) {
      return sharp({
        create: {
          width: size.width,
          height: size.height,
          channels: 3,
          background: { r: 0, g: 0, b: 0 },
        },
      })
        .composite([{ input: labelSvg(size, label), top: 0, left: 0 }])
        .jpeg({ quality })
        .toBuffer();
    },
  };
}
