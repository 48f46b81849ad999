import { describe, it, expect } from 'vitest'
import { createRaster, level, normalizeRoll } from '@pano2points/core'
import { run } from '../cli.js'
import { parseConvertArgs, toConvertRequest } from '../commands/convert.js'
import { DEFAULT_CONFIG } from '@pano2points/config'
import { alternatingImage, makeContext } from './helpers.js'

// ─── Argument parsing ───────────────────────────────────────────────────────

describe('parseConvertArgs', () => {
  const ctx = { config: DEFAULT_CONFIG }

  it('fills defaults from the configuration', () => {
    const options = parseConvertArgs(['pano.jpg'], ctx)
    expect(options?.radius).toBe(50)
    expect(options?.maxSize).toBe(2000)
    expect(options?.invert).toBe(false)
  })

  it('reads every option', () => {
    const options = parseConvertArgs(
      [
        'pano.jpg',
        '-o', 'out.xyz',
        '-r', '25',
        '--max-size', '512',
        '--invert',
        '--rotate-x', '10',
        '--rotate-y=-20',
        '--rotate-z', '30',
        '--height-min', '0.1',
        '--height-max', '0.9',
        '--brightness-min', '0.2',
        '--brightness-max', '0.8',
        '--preview',
        '--preview-dither', 'dots.png',
      ],
      ctx,
    )
    expect(options).toEqual({
      input: 'pano.jpg',
      output: 'out.xyz',
      radius: 25,
      maxSize: 512,
      invert: true,
      rotateX: 10,
      rotateY: -20,
      rotateZ: 30,
      heightMin: 0.1,
      heightMax: 0.9,
      brightnessMin: 0.2,
      brightnessMax: 0.8,
      preview: true,
      previewDither: 'dots.png',
    })
  })

  it('reads negative numbers given as separate arguments', () => {
    const options = parseConvertArgs(['pano.jpg', '--rotate-x', '-30', '--rotate-z', '-1.5', '--rotate-y=-.5'], ctx)
    expect(options?.rotateX).toBe(-30)
    expect(options?.rotateY).toBe(-0.5)
    expect(options?.rotateZ).toBe(-1.5)
  })

  it('still rejects a negative radius given as a separate argument', () => {
    expect(() => parseConvertArgs(['pano.jpg', '-r', '-5'], ctx)).toThrow('radius: Radius must be positive')
  })

  it('returns null for --help', () => {
    expect(parseConvertArgs(['--help'], ctx)).toBeNull()
  })

  it('rejects unknown options', () => {
    expect(() => parseConvertArgs(['pano.jpg', '--sparkle'], ctx)).toThrow(/Invalid options/)
  })

  it('requires exactly one input', () => {
    expect(() => parseConvertArgs([], ctx)).toThrow('input: Input path is required')
    expect(() => parseConvertArgs(['a.jpg', 'b.jpg'], ctx)).toThrow('Unexpected arguments: b.jpg')
  })
})

describe('toConvertRequest', () => {
  const ctx = { config: DEFAULT_CONFIG }

  it('derives the output and preview paths', () => {
    const options = parseConvertArgs(['pano.jpg', '--preview'], ctx)
    expect(options).not.toBeNull()
    if (!options) return
    const req = toConvertRequest(options)
    expect(req.outputPath).toBe('pano.ply')
    expect(req.previewPath).toBe('pano_dithered.png')
  })

  it('prefers an explicit preview path', () => {
    const options = parseConvertArgs(['pano.jpg', '--preview', '--preview-dither', 'x.png'], ctx)
    if (!options) throw new Error('expected options')
    expect(toConvertRequest(options).previewPath).toBe('x.png')
  })

  it('leaves the preview off by default', () => {
    const options = parseConvertArgs(['pano.jpg'], ctx)
    if (!options) throw new Error('expected options')
    expect(toConvertRequest(options).previewPath).toBeUndefined()
  })
})

// ─── convert command ────────────────────────────────────────────────────────

describe('run: convert', () => {
  it('converts and exits 0', async () => {
    const ctx = makeContext()
    ctx.io.images.set('pano.png', alternatingImage())

    expect(await run(['pano.png', '-r', '1'], ctx)).toBe(0)
    expect(ctx.io.texts.get('pano.ply')).toContain('element vertex 4\n')
    const messages = ctx.out.entries().map((e) => e['msg'])
    expect(messages).toEqual([
      'Loading panorama',
      'Parameters',
      'Mode',
      'Generated points',
      'Point cloud saved',
    ])
    expect(ctx.out.entries()[3]).toMatchObject({ points: 4, width: 4, height: 2 })
  })

  it('accepts an explicit convert subcommand', async () => {
    const ctx = makeContext()
    ctx.io.images.set('pano.png', alternatingImage())
    expect(await run(['convert', 'pano.png', '-o', 'pano.xyz'], ctx)).toBe(0)
    expect(ctx.io.texts.has('pano.xyz')).toBe(true)
  })

  it('logs the optional settings it uses', async () => {
    const ctx = makeContext()
    ctx.io.images.set('pano.png', alternatingImage())
    await run(['pano.png', '--rotate-y', '90', '--height-min', '0.5', '--invert', '--preview'], ctx)
    const entries = ctx.out.entries()
    expect(entries.find((e) => e['msg'] === 'Mode')).toMatchObject({ mode: 'inverted' })
    expect(entries.find((e) => e['msg'] === 'Rotation')).toMatchObject({ x: 0, y: 90, z: 0 })
    expect(entries.find((e) => e['msg'] === 'Height range')).toMatchObject({ min: 0.5, max: 1 })
    expect(entries.find((e) => e['msg'] === 'Dither preview saved')).toMatchObject({
      path: 'pano_dithered.png',
    })
    expect(ctx.io.images.has('pano_dithered.png')).toBe(true)
  })

  it('exits 1 when the input does not exist', async () => {
    const ctx = makeContext()
    expect(await run(['missing.jpg'], ctx)).toBe(1)
    expect(ctx.err.entries()).toEqual([
      { ts: '1970-01-01T00:00:00.000Z', level: 'error', msg: 'Input file not found', path: 'missing.jpg' },
    ])
    expect(ctx.io.writes).toEqual([])
  })

  it('exits 1 with the validation issues', async () => {
    const ctx = makeContext()
    ctx.io.images.set('pano.png', alternatingImage())
    expect(await run(['pano.png', '--height-max', '2'], ctx)).toBe(1)
    expect(ctx.err.entries()[0]).toMatchObject({
      msg: 'Invalid options',
      issues: ['heightMax: Must be between 0 and 1'],
    })
  })

  it('exits 1 and reports conversion failures', async () => {
    const ctx = makeContext()
    ctx.io.images.set('pano.png', alternatingImage())
    ctx.io.failWritesTo.add('pano.ply')
    expect(await run(['pano.png'], ctx)).toBe(1)
    expect(ctx.err.entries()[0]).toMatchObject({
      msg: 'Error during conversion',
      kind: 'ConversionError',
      error: "Conversion failed during serialize: EACCES: permission denied, open 'pano.ply'",
    })
  })

  it('reports degenerate images', async () => {
    const ctx = makeContext()
    ctx.io.images.set('strip.png', createRaster(6, 1, 1, new Uint8Array(6)))
    expect(await run(['strip.png'], ctx)).toBe(1)
    expect(ctx.err.entries()[0]).toMatchObject({ kind: 'DegenerateImageError' })
  })

  it('prints usage for --help', async () => {
    const ctx = makeContext()
    expect(await run(['--help'], ctx)).toBe(0)
    expect(ctx.help.text()).toContain('Usage: pano2points [convert] <input> [options]')
  })

  it('prints usage and exits 1 without arguments', async () => {
    const ctx = makeContext()
    expect(await run([], ctx)).toBe(1)
    expect(ctx.help.text()).toContain('pano2points level <input>')
  })
})

// ─── level command ──────────────────────────────────────────────────────────

describe('run: level', () => {
  const sidecar = {
    id: 'pano-test-1',
    date: '2024-06',
    lat: 40.73,
    lon: -73.99,
    pitch: 0.1,
    roll: 2 * Math.PI - 0.05,
    heading: 1.2,
    elevation: 10,
    auto_leveled: false,
  }

  function rgbPanorama() {
    const w = 9
    const h = 5
    const data = new Uint8Array(w * h * 3)
    for (let i = 0; i < data.length; i++) data[i] = (i * 7) % 256
    return createRaster(w, h, 3, data)
  }

  function setup(meta: Record<string, unknown> = sidecar) {
    const ctx = makeContext()
    ctx.io.images.set('street.jpg', rgbPanorama())
    ctx.io.texts.set('street.json', JSON.stringify(meta))
    return ctx
  }

  it('levels pitch and normalized roll, keeping the heading', async () => {
    const ctx = setup()
    expect(await run(['level', 'street.jpg'], ctx)).toBe(0)

    const expected = level(rgbPanorama(), {
      pitch: 0.1,
      roll: normalizeRoll(sidecar.roll),
      heading: 0,
    })
    const written = ctx.io.images.get('street_leveled.jpg')
    expect(written?.channels).toBe(3)
    expect(Array.from(written?.data ?? [])).toEqual(Array.from(expected.data))
  })

  it('writes an updated sidecar beside the output', async () => {
    const ctx = setup()
    await run(['level', 'street.jpg', '-o', 'flat.png'], ctx)
    const meta: unknown = JSON.parse(ctx.io.texts.get('flat.json') ?? 'null')
    expect(meta).toEqual({ ...sidecar, auto_leveled: true })
    expect(ctx.io.texts.get('flat.json')?.endsWith('\n')).toBe(true)
  })

  it('corrects the heading on request', async () => {
    const ctx = setup()
    await run(['level', 'street.jpg', '--correct-heading'], ctx)
    const expected = level(rgbPanorama(), {
      pitch: 0.1,
      roll: normalizeRoll(sidecar.roll),
      heading: 1.2,
    })
    expect(Array.from(ctx.io.images.get('street_leveled.jpg')?.data ?? [])).toEqual(Array.from(expected.data))
  })

  it('skips panoramas that are already leveled', async () => {
    const ctx = setup({ ...sidecar, auto_leveled: true })
    expect(await run(['level', 'street.jpg'], ctx)).toBe(0)
    expect(ctx.io.writes).toEqual([])
    expect(ctx.err.entries()[0]).toMatchObject({ level: 'warn', msg: 'Panorama already leveled, nothing to do' })
  })

  it('levels again with --force', async () => {
    const ctx = setup({ ...sidecar, auto_leveled: true })
    expect(await run(['level', 'street.jpg', '--force'], ctx)).toBe(0)
    expect(ctx.io.writes).toEqual(['street_leveled.jpg', 'street_leveled.json'])
  })

  it('reads the sidecar from --metadata', async () => {
    const ctx = makeContext()
    ctx.io.images.set('street.jpg', rgbPanorama())
    ctx.io.texts.set('meta/pano.json', JSON.stringify(sidecar))
    expect(await run(['level', 'street.jpg', '-m', 'meta/pano.json'], ctx)).toBe(0)
  })

  it('exits 1 without a sidecar', async () => {
    const ctx = makeContext()
    ctx.io.images.set('street.jpg', rgbPanorama())
    expect(await run(['level', 'street.jpg'], ctx)).toBe(1)
    expect(ctx.err.entries()[0]).toMatchObject({ msg: 'Input file not found', path: 'street.json' })
  })

  it('exits 1 for an invalid sidecar', async () => {
    const ctx = setup({ id: 'x' })
    expect(await run(['level', 'street.jpg'], ctx)).toBe(1)
    expect(ctx.err.entries()[0]).toMatchObject({ msg: 'Invalid metadata', path: 'street.json' })
  })

  it('exits 1 for malformed JSON', async () => {
    const ctx = makeContext()
    ctx.io.images.set('street.jpg', rgbPanorama())
    ctx.io.texts.set('street.json', '{not json')
    expect(await run(['level', 'street.jpg'], ctx)).toBe(1)
    expect(ctx.err.entries()[0]).toMatchObject({ msg: 'Invalid metadata' })
  })

  it('prints its own usage', async () => {
    const ctx = makeContext()
    expect(await run(['level', '-h'], ctx)).toBe(0)
    expect(ctx.help.text()).toContain('Usage: pano2points level <input> [options]')
  })
})
