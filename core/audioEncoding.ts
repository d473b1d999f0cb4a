const WAV_HEADER_SIZE = 44

/**
 * Decode signed 16-bit little-endian PCM into floats in [-1, 1).
 * A trailing odd byte is ignored.
 */
export function pcm16ToFloat32(buffer: Buffer): Float32Array {
  const samples = new Float32Array(Math.floor(buffer.length / 2));
  for (let i = 0; i < samples.length; i++) {
    samples[i] = buffer.readInt16LE(i * 2) / 32768.0;
  }
  return samples;
}

/**
 * Encode float samples as signed 16-bit little-endian PCM, clamping to [-1, 1].
 */
export function float32ToPcm16(samples: Float32Array): Buffer {
  const pcm = Buffer.alloc(samples.length * 2);
  for (let i = 0; i < samples.length; i++) {
    const sample = Math.max(-1, Math.min(1, samples[i]));
    const value = Math.floor(sample < 0 ? sample * 32768 : sample * 32767);
    pcm.writeInt16LE(value, i * 2);
  }
  return pcm;
}

/**
 * Wrap mono 16-bit PCM in a canonical 44-byte RIFF/WAVE header.
 */
export function encodeWav(pcm: Buffer, sampleRate: number): Buffer {
  const channels = 1;
  const bitsPerSample = 16;
  const blockAlign = channels * (bitsPerSample / 8);
  const byteRate = sampleRate * blockAlign;

  const header = Buffer.alloc(WAV_HEADER_SIZE);
  let offset = 0;

  // RIFF Header
  header.write('RIFF', offset); offset += 4;
  header.writeUInt32LE(36 + pcm.length, offset); offset += 4;
  header.write('WAVE', offset); offset += 4;

  // Format Chunk
  header.write('fmt ', offset); offset += 4;
  header.writeUInt32LE(16, offset); offset += 4;
  header.writeUInt16LE(1, offset); offset += 2;
  header.writeUInt16LE(channels, offset); offset += 2;
  header.writeUInt32LE(sampleRate, offset); offset += 4;
  header.writeUInt32LE(byteRate, offset); offset += 4;
  header.writeUInt16LE(blockAlign, offset); offset += 2;
  header.writeUInt16LE(bitsPerSample, offset); offset += 2;

  // Data Chunk Header
  header.write('data', offset); offset += 4;
  header.writeUInt32LE(pcm.length, offset);

  return Buffer.concat([header, pcm]);
}
