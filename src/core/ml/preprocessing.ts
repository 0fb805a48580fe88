import sharp from 'sharp'
import {
  DEFAULT_PIXEL_SCALE,
  MODEL_INPUT_CHANNELS,
  MODEL_INPUT_HEIGHT,
  MODEL_INPUT_WIDTH,
} from '@shared/constants/thresholds'
import type { ImageSize, ImageTensor } from '@shared/types'
import { ImageDecodeError, errorMessage } from '../errors'

// @DEV-GUIDE: Image normalization for inference. Decodes any format sharp understands (JPEG and
// PNG at minimum), drops alpha and colour profile, stretches to exactly H x W (fit: 'fill', no
// letterboxing) with a fixed bicubic kernel, and emits a [1, H, W, 3] float32 tensor in HWC order.
//
// Note: samples stay 0-255 floats by default because the exported model carries its own
// Rescaling layer. pixelScale (e.g. 1/255) exists for models that expect [0, 1] input.

export interface NormalizeOptions {
  size?: ImageSize
  pixelScale?: number
}

export const RESIZE_KERNEL = 'cubic' as const

/**
 * Decodes, resizes and converts raw image bytes into the scorer's input tensor.
 * Throws ImageDecodeError when the bytes are not a decodable image.
 */
export async function normalizeImage(
  bytes: Uint8Array,
  options: NormalizeOptions = {},
): Promise<ImageTensor> {
  const { height, width } = options.size ?? {
    height: MODEL_INPUT_HEIGHT,
    width: MODEL_INPUT_WIDTH,
  }
  const pixelScale = options.pixelScale ?? DEFAULT_PIXEL_SCALE

  const raw = await decodeToRgb(bytes, { height, width })
  return {
    data: bufferToFloat32(raw, pixelScale),
    dims: [1, height, width, 3],
  }
}

/**
 * Decodes image bytes to packed RGB uint8 samples of exactly height x width.
 */
export async function decodeToRgb(bytes: Uint8Array, size: ImageSize): Promise<Buffer> {
  const input = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength)

  let output: { data: Buffer; info: sharp.OutputInfo }
  try {
    output = await sharp(input)
      .removeAlpha()
      .toColourspace('srgb')
      .resize(size.width, size.height, { fit: 'fill', kernel: RESIZE_KERNEL })
      .raw()
      .toBuffer({ resolveWithObject: true })
  } catch (error) {
    throw new ImageDecodeError(`Failed to process image: ${errorMessage(error)}`, {
      cause: error,
    })
  }

  const expected = size.height * size.width * MODEL_INPUT_CHANNELS
  if (output.info.channels !== MODEL_INPUT_CHANNELS || output.data.length !== expected) {
    throw new ImageDecodeError(
      `Failed to process image: decoded ${output.info.width}x${output.info.height}x${output.info.channels}, expected ${size.width}x${size.height}x${MODEL_INPUT_CHANNELS}`,
    )
  }

  return output.data
}

/**
 * Converts a raw uint8 buffer to Float32Array, multiplying each sample by scale.
 */
export function bufferToFloat32(rawBuffer: Uint8Array, scale = DEFAULT_PIXEL_SCALE): Float32Array {
  const float32 = new Float32Array(rawBuffer.length)
  for (let i = 0; i < rawBuffer.length; i++) {
    float32[i] = rawBuffer[i] * scale
  }
  return float32
}
