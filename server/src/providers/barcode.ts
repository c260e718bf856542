import sharp from 'sharp';
import zxing from '@zxing/library';
import type { DecodeHintType as HintType } from '@zxing/library';
import { errorMessage, log } from '../logger.js';

const { BarcodeFormat, BinaryBitmap, DecodeHintType, HybridBinarizer, MultiFormatReader, RGBLuminanceSource } = zxing;

const MODULE = 'barcode';

/** Raw image bytes → decoded text, or null when no code is recognized. */
export interface BarcodeDecoder {
    decode(image: Buffer): Promise<string | null>;
}

const RETAIL_FORMATS = [
    BarcodeFormat.EAN_13,
    BarcodeFormat.EAN_8,
    BarcodeFormat.UPC_A,
    BarcodeFormat.UPC_E,
    BarcodeFormat.CODE_128,
    BarcodeFormat.QR_CODE,
];

/**
 * Decodes product barcodes from photos: sharp reduces the image to one
 * luminance channel, ZXing's multi-format reader finds the code.
 */
export class ZxingBarcodeDecoder implements BarcodeDecoder {
    async decode(image: Buffer): Promise<string | null> {
        let pixels: { data: Buffer; info: sharp.OutputInfo };
        try {
            pixels = await sharp(image)
                .flatten({ background: '#ffffff' })
                .toColourspace('b-w')
                .raw()
                .toBuffer({ resolveWithObject: true });
        } catch (err) {
            log.warn(MODULE, 'Could not read image', { error: errorMessage(err) });
            return null;
        }

        const { width, height, channels } = pixels.info;
        const luminances = new Uint8ClampedArray(width * height);
        for (let i = 0; i < luminances.length; i++) luminances[i] = pixels.data[i * channels];

        const hints = new Map<HintType, unknown>([
            [DecodeHintType.POSSIBLE_FORMATS, RETAIL_FORMATS],
            [DecodeHintType.TRY_HARDER, true],
        ]);
        const reader = new MultiFormatReader();
        reader.setHints(hints);

        try {
            const bitmap = new BinaryBitmap(new HybridBinarizer(new RGBLuminanceSource(luminances, width, height)));
            const text = reader.decode(bitmap).getText();
            log.debug(MODULE, 'Decoded barcode', { text });
            return text;
        } catch (err) {
            // NotFound / Format / Checksum: nothing readable in the picture.
            log.debug(MODULE, 'No barcode recognized', { reason: err instanceof Error ? err.name : String(err) });
            return null;
        }
    }
}
