import sharp from 'sharp';
import zxing from '@zxing/library';
import { describe, expect, it } from 'vitest';
import { ZxingBarcodeDecoder } from './barcode.js';

const { BarcodeFormat, QRCodeWriter } = zxing;

/** Render a QR code as a PNG with a white quiet zone. */
async function qrPng(text: string): Promise<Buffer> {
    const size = 240;
    const matrix = new QRCodeWriter().encode(text, BarcodeFormat.QR_CODE, size, size, new Map());
    const pixels = Buffer.alloc(size * size, 255);
    for (let y = 0; y < size; y++) {
        for (let x = 0; x < size; x++) {
            if (matrix.get(x, y)) pixels[y * size + x] = 0;
        }
    }
    return sharp(pixels, { raw: { width: size, height: size, channels: 1 } }).png().toBuffer();
}

describe('ZxingBarcodeDecoder', () => {
    const decoder = new ZxingBarcodeDecoder();

    it('reads the code out of a picture', async () => {
        expect(await decoder.decode(await qrPng('0012345678905'))).toBe('0012345678905');
    });

    it('returns null for a picture without a code', async () => {
        const blank = await sharp({ create: { width: 200, height: 120, channels: 3, background: '#ffffff' } })
            .png()
            .toBuffer();
        expect(await decoder.decode(blank)).toBeNull();
    });

    it('returns null for bytes that are not an image', async () => {
        expect(await decoder.decode(Buffer.from('definitely not a photo'))).toBeNull();
    });
});
