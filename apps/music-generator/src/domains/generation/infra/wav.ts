export const WAV_HEADER_BYTES = 44

export type PcmFormat = {
  sampleRate: number
  channels: number
}

/** Wrap 16-bit little-endian PCM samples in a RIFF/WAVE container. */
export function encodeWav(pcm: Buffer, format: PcmFormat): Buffer {
  const header = Buffer.alloc(WAV_HEADER_BYTES)
  const blockAlign = format.channels * 2

  header.write("RIFF", 0, "ascii")
  header.writeUInt32LE(36 + pcm.length, 4)
  header.write("WAVE", 8, "ascii")
  header.write("fmt ", 12, "ascii")
  header.writeUInt32LE(16, 16)
  header.writeUInt16LE(1, 20) // PCM
  header.writeUInt16LE(format.channels, 22)
  header.writeUInt32LE(format.sampleRate, 24)
  header.writeUInt32LE(format.sampleRate * blockAlign, 28)
  header.writeUInt16LE(blockAlign, 32)
  header.writeUInt16LE(16, 34)
  header.write("data", 36, "ascii")
  header.writeUInt32LE(pcm.length, 40)

  return Buffer.concat([header, pcm])
}

export function silentWav(durationSeconds: number, format: PcmFormat): Buffer {
  const frames = Math.round(durationSeconds * format.sampleRate)

  return encodeWav(Buffer.alloc(frames * format.channels * 2), format)
}
