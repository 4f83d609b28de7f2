import { Buffer } from 'node:buffer'
import piexif from 'piexifjs'
import sharp from 'sharp'

export const ARTIST = 'Stable Diffusion'

const JPEG_MAGIC = Buffer.from([0xFF, 0xD8, 0xFF])
const PNG_MAGIC = Buffer.from([0x89, 0x50, 0x4E, 0x47, 0x0D, 0x0A, 0x1A, 0x0A])

/** JPEG: 直接插入 APP1 段，不重新编码 */
function insertJpegExif(image: Buffer, prompt: string): Buffer {
  // piexifjs 以 binary string 处理字节
  const exif = piexif.dump({
    '0th': {
      [piexif.ImageIFD.Artist]: ARTIST,
      [piexif.ImageIFD.ImageDescription]: Buffer.from(prompt, 'utf8').toString('binary'),
    },
  })
  return Buffer.from(piexif.insert(exif, image.toString('binary')), 'binary')
}

/** PNG: sharp 写入 eXIf 块，PNG 为无损编码 */
function insertPngExif(image: Buffer, prompt: string): Promise<Buffer> {
  return sharp(image)
    .withExif({
      IFD0: {
        Artist: ARTIST,
        ImageDescription: prompt,
      },
    })
    .png()
    .toBuffer()
}

/**
 * 将 prompt 写入图片 EXIF (IFD0 ImageDescription / Artist)
 *
 * 支持 PNG 与 JPEG，像素数据保持不变
 */
export async function addPromptMetadata(image: Buffer, prompt: string): Promise<Buffer> {
  try {
    if (image.subarray(0, JPEG_MAGIC.length).equals(JPEG_MAGIC))
      return insertJpegExif(image, prompt)
    if (image.subarray(0, PNG_MAGIC.length).equals(PNG_MAGIC))
      return await insertPngExif(image, prompt)
    throw new Error('image is neither PNG nor JPEG')
  }
  catch (err) {
    throw new Error(`failed to add new exif metadata: ${err instanceof Error ? err.message : String(err)}`, { cause: err })
  }
}
