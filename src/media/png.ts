import { PNG } from 'pngjs';
import { RasterImage } from '../interfaces';
import {
  PNG_COLOR_TYPE_RGB,
  PNG_COLOR_TYPE_RGBA,
  PNG_DECODED_CHANNELS,
} from '../utils/constants';
import { ErrorFactory } from '../utils/error-factory';
import { toError } from '../utils/errors';
import { isPng } from './container';

function readPng(file: Buffer) {
  if (!isPng(file)) {
    throw ErrorFactory.UNSUPPORTED_MEDIA('image', 'Image carrier must be a PNG file');
  }
  try {
    return PNG.sync.read(file);
  } catch (err) {
    throw ErrorFactory.UNSUPPORTED_MEDIA('image', `Cannot decode PNG: ${toError(err).message}`);
  }
}

/**
 * Decode a PNG into 3-channel (RGB) or 4-channel (RGBA) pixels.
 * Greyscale and palette images become RGB; images with alpha keep it.
 */
export function decodePng(file: Buffer): RasterImage {
  const decoded = readPng(file);
  const channels = decoded.alpha ? 4 : 3;
  const pixelCount = decoded.width * decoded.height;
  const data = new Uint8Array(pixelCount * channels);

  for (let pixel = 0; pixel < pixelCount; pixel++) {
    for (let channel = 0; channel < channels; channel++) {
      data[pixel * channels + channel] = decoded.data[pixel * PNG_DECODED_CHANNELS + channel];
    }
  }

  return { width: decoded.width, height: decoded.height, channels, data };
}

/**
 * Encode pixels as an 8-bit RGB or RGBA PNG
 */
export function encodePng(image: RasterImage): Buffer {
  const png = new PNG({ width: image.width, height: image.height });
  const pixelCount = image.width * image.height;

  for (let pixel = 0; pixel < pixelCount; pixel++) {
    const target = pixel * PNG_DECODED_CHANNELS;
    const source = pixel * image.channels;
    png.data[target] = image.data[source];
    png.data[target + 1] = image.data[source + 1];
    png.data[target + 2] = image.data[source + 2];
    png.data[target + 3] = image.channels === 4 ? image.data[source + 3] : 255;
  }

  return PNG.sync.write(png, {
    colorType: image.channels === 4 ? PNG_COLOR_TYPE_RGBA : PNG_COLOR_TYPE_RGB,
  });
}
