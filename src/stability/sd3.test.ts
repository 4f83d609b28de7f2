import type { Sd3Request } from './sd3.js'
import { Buffer } from 'node:buffer'
import { Readable } from 'node:stream'
import { describe, expect, it } from 'vitest'
import { boundaryOf, parseMultipart } from '../testing/multipart.js'
import { SUPPORTED_ASPECT_RATIOS } from './aspect-ratio.js'
import { SerializationError, ValidationError } from './errors.js'
import { SD3_MODELS } from './models.js'
import { createSd3Request, serializeSd3Request, validateSd3Request } from './sd3.js'

const bearRequest = createSd3Request({
  prompt: 'a bear riding a unicycle',
  model: 'sd3-large',
  aspectRatio: { width: 1, height: 1 },
  outputFormat: 'png',
})

function validationKind(request: Sd3Request): string {
  try {
    validateSd3Request(request)
  }
  catch (err) {
    if (err instanceof ValidationError)
      return err.kind
    throw err
  }
  return 'ok'
}

describe('createSd3Request', () => {
  it('fills documented defaults', () => {
    expect(createSd3Request({ prompt: 'fox' })).toEqual({
      prompt: 'fox',
      model: 'sd3-large',
      outputFormat: 'png',
      aspectRatio: { width: 1, height: 1 },
      negativePrompt: undefined,
      strength: undefined,
      image: undefined,
    })
  })
})

describe('validateSd3Request', () => {
  it('accepts every known model with every supported ratio', () => {
    for (const model of SD3_MODELS) {
      for (const aspectRatio of SUPPORTED_ASPECT_RATIOS) {
        expect(validationKind({ ...bearRequest, model, aspectRatio })).toBe('ok')
      }
    }
  })

  it('accepts prompts of 1 and 10,000 characters', () => {
    expect(validationKind({ ...bearRequest, prompt: 'x' })).toBe('ok')
    expect(validationKind({ ...bearRequest, prompt: 'x'.repeat(10_000) })).toBe('ok')
  })

  it('rejects an empty prompt', () => {
    expect(validationKind({ ...bearRequest, prompt: '' })).toBe('empty_prompt')
  })

  it('rejects long positive and negative prompts with the length kind', () => {
    expect(validationKind({ ...bearRequest, prompt: 'x'.repeat(10_001) })).toBe('prompt_too_long')
    expect(validationKind({ ...bearRequest, negativePrompt: 'x'.repeat(20_000) })).toBe('prompt_too_long')
  })

  it('reports which prompt was too long', () => {
    try {
      validateSd3Request({ ...bearRequest, negativePrompt: 'x'.repeat(10_001) })
      expect.unreachable()
    }
    catch (err) {
      expect(err).toBeInstanceOf(ValidationError)
      expect(err).toMatchObject({ field: 'negative_prompt' })
    }
  })

  it('rejects unknown models, including older identifiers', () => {
    for (const model of ['sd3', 'sd3turbo', 'sd3-ultra', '']) {
      expect(validationKind({ ...bearRequest, model })).toBe('unknown_model')
    }
  })

  it('rejects ratios outside the allow-list (scenario B)', () => {
    expect(validationKind({ ...bearRequest, aspectRatio: { width: 3, height: 5 } }))
      .toBe('unsupported_aspect_ratio')
    expect(validationKind({ ...bearRequest, aspectRatio: { width: 0, height: 0 } }))
      .toBe('invalid_aspect_ratio')
  })

  it('checks strength only when present', () => {
    expect(validationKind({ ...bearRequest, strength: 0 })).toBe('ok')
    expect(validationKind({ ...bearRequest, strength: 1 })).toBe('ok')
    expect(validationKind({ ...bearRequest, strength: 1.5 })).toBe('strength_out_of_range')
    expect(validationKind({ ...bearRequest, strength: -0.5 })).toBe('strength_out_of_range')
  })

  it('rejects unsupported output formats', () => {
    expect(validationKind({ ...bearRequest, outputFormat: 'gif' })).toBe('invalid_output_format')
  })

  it('fails fast on the first violated rule', () => {
    expect(validationKind({ ...bearRequest, prompt: '', model: 'nope' })).toBe('empty_prompt')
    expect(validationKind({
      ...bearRequest,
      prompt: 'x'.repeat(10_001),
      aspectRatio: { width: 3, height: 5 },
    })).toBe('prompt_too_long')
    expect(validationKind({
      ...bearRequest,
      model: 'nope',
      aspectRatio: { width: 3, height: 5 },
    })).toBe('unknown_model')
  })
})

describe('serializeSd3Request', () => {
  it('writes the bear request (scenario A) byte for byte', async () => {
    const form = await serializeSd3Request(bearRequest, { boundary: 'test-boundary' })

    expect(form.contentType).toBe('multipart/form-data; boundary=test-boundary')
    expect(form.body.toString('utf8')).toBe(
      '--test-boundary\r\nContent-Disposition: form-data; name="aspect_ratio"\r\n\r\n1:1\r\n'
      + '--test-boundary\r\nContent-Disposition: form-data; name="prompt"\r\n\r\na bear riding a unicycle\r\n'
      + '--test-boundary\r\nContent-Disposition: form-data; name="model"\r\n\r\nsd3-large\r\n'
      + '--test-boundary\r\nContent-Disposition: form-data; name="output_format"\r\n\r\npng\r\n'
      + '--test-boundary--\r\n',
    )
  })

  it('omits the image field when no reference image is given', async () => {
    const form = await serializeSd3Request(bearRequest)
    const names = parseMultipart(form.body, boundaryOf(form.contentType)).map(p => p.name)
    expect(names).toEqual(['aspect_ratio', 'prompt', 'model', 'output_format'])
  })

  it('writes all fields in a fixed order', async () => {
    const form = await serializeSd3Request({
      ...bearRequest,
      aspectRatio: { width: 16, height: 9 },
      negativePrompt: 'blurry',
      strength: 0.7,
      image: Readable.from([Buffer.from('abc'), Buffer.from('def')]),
    }, { boundary: 'fixed' })

    const parts = parseMultipart(form.body, 'fixed')
    expect(parts.map(p => [p.name, p.value.toString('utf8')])).toEqual([
      ['aspect_ratio', '16:9'],
      ['prompt', 'a bear riding a unicycle'],
      ['model', 'sd3-large'],
      ['output_format', 'png'],
      ['negative_prompt', 'blurry'],
      ['strength', '0.70'],
      ['image', 'abcdef'],
    ])
    expect(parts[6].headers).toEqual([
      'Content-Disposition: form-data; name="image"',
      'Content-Type: application/octet-stream',
    ])
  })

  it('omits strength when it is zero', async () => {
    const form = await serializeSd3Request({ ...bearRequest, strength: 0 }, { boundary: 'b' })
    expect(parseMultipart(form.body, 'b').map(p => p.name)).not.toContain('strength')
  })

  it('produces identical bodies for identical input and boundary', async () => {
    const request = { ...bearRequest, negativePrompt: 'fog', strength: 0.25 }
    const first = await serializeSd3Request(request, { boundary: 'same' })
    const second = await serializeSd3Request(request, { boundary: 'same' })
    expect(first.body.equals(second.body)).toBe(true)
  })

  it('keeps multibyte prompts intact', async () => {
    const form = await serializeSd3Request({ ...bearRequest, prompt: '骑独轮车的熊' }, { boundary: 'u' })
    const prompt = parseMultipart(form.body.toString('utf8'), 'u').find(p => p.name === 'prompt')
    expect(prompt?.value.toString('utf8')).toBe('骑独轮车的熊')
  })

  it('wraps image read failures in a SerializationError', async () => {
    const broken = new Readable({
      read() {
        this.destroy(new Error('disk fault'))
      },
    })

    const result = serializeSd3Request({ ...bearRequest, image: broken })
    await expect(result).rejects.toBeInstanceOf(SerializationError)
    await expect(result).rejects.toThrow('failed to copy image to form fields for request: disk fault')
  })
})
