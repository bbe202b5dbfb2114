/**
 * sharp image source and tesseract adapter tests
 *
 * Images are generated with sharp; the recognition binary is a small shell
 * script written into a temp directory, so neither Poppler nor Tesseract is
 * needed.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import sharp from 'sharp';
import { ImageAcquisitionError, type ImageVariant } from '@triage/shared';
import { SharpImageSource } from '../../services/worker-classifier/src/lib/image-source';
import { TesseractEngine } from '../../services/worker-classifier/src/lib/tesseract';

async function dimensions(image: ImageVariant): Promise<{ width?: number; height?: number; format?: string }> {
  const { width, height, format } = await sharp(image.data).metadata();
  return { width, height, format };
}

function blankPage(width: number, height: number): sharp.Sharp {
  return sharp({ create: { width, height, channels: 3, background: { r: 255, g: 255, b: 255 } } });
}

describe('SharpImageSource', () => {
  let dir: string;
  let source: SharpImageSource;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'image-source-'));
    source = new SharpImageSource({ pdftoppmPath: path.join(dir, 'no-pdftoppm') });
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  async function writePage(name: string, width = 40, height = 20): Promise<string> {
    const filePath = path.join(dir, name);
    await blankPage(width, height).toFile(filePath);
    return filePath;
  }

  it('should load an image as an unrotated native PNG', async () => {
    const image = await source.load(await writePage('page.png'));

    expect(image.orientation).toBe(0);
    expect(image.scale).toBe('native');
    expect(await dimensions(image)).toEqual({ width: 40, height: 20, format: 'png' });
  });

  it('should convert other formats to PNG', async () => {
    const image = await source.load(await writePage('page.jpg'));

    expect(await dimensions(image)).toEqual({ width: 40, height: 20, format: 'png' });
  });

  it('should swap dimensions on a quarter turn', async () => {
    const image = await source.load(await writePage('page.png'));

    const rotated = await source.rotate(image, 90);

    expect(rotated.orientation).toBe(90);
    expect(rotated.scale).toBe('native');
    expect(await dimensions(rotated)).toEqual({ width: 20, height: 40, format: 'png' });
  });

  it('should keep dimensions on a half turn', async () => {
    const image = await source.load(await writePage('page.png'));

    const rotated = await source.rotate(image, 180);

    expect(rotated.orientation).toBe(180);
    expect(await dimensions(rotated)).toEqual({ width: 40, height: 20, format: 'png' });
  });

  it('should return the source pixels for rotation 0', async () => {
    const image = await source.load(await writePage('page.png'));

    const rotated = await source.rotate(image, 0);

    expect(rotated.data).toBe(image.data);
    expect(rotated.orientation).toBe(0);
  });

  it('should upscale by the factor and mark the variant', async () => {
    const image = await source.load(await writePage('page.png'));

    const upscaled = await source.upscale(image, 2);

    expect(upscaled.scale).toBe('upscaled');
    expect(upscaled.orientation).toBe(0);
    expect(await dimensions(upscaled)).toEqual({ width: 80, height: 40, format: 'png' });
  });

  it('should reject a file that is not an image', async () => {
    const filePath = path.join(dir, 'broken.png');
    fs.writeFileSync(filePath, 'not an image');

    await expect(source.load(filePath)).rejects.toThrow(ImageAcquisitionError);
    await expect(source.load(filePath)).rejects.toThrow(`Could not load image from: ${filePath}`);
  });

  it('should reject a missing file', async () => {
    await expect(source.load(path.join(dir, 'absent.png'))).rejects.toThrow(ImageAcquisitionError);
  });

  it('should reject a PDF when the renderer cannot run', async () => {
    const filePath = path.join(dir, 'scan.pdf');
    fs.writeFileSync(filePath, '%PDF-1.4');

    await expect(source.load(filePath)).rejects.toThrow(ImageAcquisitionError);
  });
});

describe('TesseractEngine', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'tesseract-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function writeBinary(body: string): string {
    const binaryPath = path.join(dir, 'fake-tesseract');
    fs.writeFileSync(binaryPath, `#!/bin/sh\n${body}\n`);
    fs.chmodSync(binaryPath, 0o755);
    return binaryPath;
  }

  const image: ImageVariant = { data: Buffer.from('png bytes'), orientation: 90, scale: 'native' };

  it('should pass language and modes and return stdout', async () => {
    const engine = new TesseractEngine({
      binaryPath: writeBinary('printf "%s|%s|%s|%s|%s\\n" "$2" "$4" "$6" "$8" "$(cat "$1")"'),
      engineMode: 3,
      pageSegmentationMode: 6,
    });

    const text = await engine.recognize(image, { language: 'tur', signal: new AbortController().signal });

    expect(text).toBe('stdout|tur|3|6|png bytes\n');
  });

  it('should remove the temporary input file', async () => {
    const engine = new TesseractEngine({ binaryPath: writeBinary('printf "%s" "$1"') });

    const inputPath = await engine.recognize(image, { language: 'tur', signal: new AbortController().signal });

    expect(path.basename(inputPath)).toBe('variant-90-native.png');
    expect(fs.existsSync(inputPath)).toBe(false);
  });

  it('should stop the process when the signal aborts', async () => {
    const engine = new TesseractEngine({ binaryPath: writeBinary('exec sleep 5') });
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 20);

    await expect(engine.recognize(image, { language: 'tur', signal: controller.signal })).rejects.toMatchObject({
      name: 'AbortError',
    });
  });

  it('should reject when the binary is missing', async () => {
    const engine = new TesseractEngine({ binaryPath: path.join(dir, 'absent') });

    await expect(
      engine.recognize(image, { language: 'tur', signal: new AbortController().signal })
    ).rejects.toMatchObject({ code: 'ENOENT' });
  });
});
