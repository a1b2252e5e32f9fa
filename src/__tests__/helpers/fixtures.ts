import sharp from 'sharp';

export const createJpeg = (size = 8): Promise<Buffer> =>
  sharp({
    create: { width: size, height: size, channels: 3, background: { r: 180, g: 180, b: 180 } },
  })
    .jpeg()
    .toBuffer();

/** A real JPEG cut to half its length. */
export const createTruncatedJpeg = async (): Promise<Buffer> => {
  const jpeg = await createJpeg(256);
  return jpeg.subarray(0, Math.floor(jpeg.length / 2));
};

export const createPng = (): Promise<Buffer> =>
  sharp({
    create: { width: 4, height: 4, channels: 4, background: { r: 0, g: 0, b: 0, alpha: 1 } },
  })
    .png()
    .toBuffer();

export const drugLabel = (overrides: Record<string, unknown> = {}): Record<string, unknown> => ({
  openfda: { brand_name: ['Painaway'] },
  dosage_and_administration: ['Take 1 tablet every 6 hours. Do not exceed 4 tablets in 24 hours.'],
  indications_and_usage: ['For temporary relief of minor aches and pains. Ask a doctor before use.'],
  ...overrides,
});
