import { describe, expect, it } from "vitest"
import { encodeWav, float32ToPcm16, pcm16ToFloat32 } from "./audioEncoding"

describe("audioEncoding", () => {
  it("clamps and scales floats to signed 16-bit PCM", () => {
    const pcm = float32ToPcm16(Float32Array.from([1.5, -2, 0.5, 0]))

    expect(pcm.length).toBe(8)
    expect(pcm.readInt16LE(0)).toBe(32767)
    expect(pcm.readInt16LE(2)).toBe(-32768)
    expect(pcm.readInt16LE(4)).toBe(16383)
    expect(pcm.readInt16LE(6)).toBe(0)
  })

  it("decodes PCM and ignores a trailing odd byte", () => {
    const pcm = Buffer.alloc(5)
    pcm.writeInt16LE(-16384, 0)
    pcm.writeInt16LE(8192, 2)

    expect(Array.from(pcm16ToFloat32(pcm))).toEqual([-0.5, 0.25])
  })

  it("writes a mono 16-bit WAV header", () => {
    const wav = encodeWav(Buffer.alloc(320), 16000)

    expect(wav.length).toBe(364)
    expect(wav.toString("ascii", 0, 4)).toBe("RIFF")
    expect(wav.readUInt32LE(4)).toBe(356)
    expect(wav.toString("ascii", 8, 12)).toBe("WAVE")
    expect(wav.toString("ascii", 12, 16)).toBe("fmt ")
    expect(wav.readUInt16LE(20)).toBe(1)
    expect(wav.readUInt16LE(22)).toBe(1)
    expect(wav.readUInt32LE(24)).toBe(16000)
    expect(wav.readUInt32LE(28)).toBe(32000)
    expect(wav.readUInt16LE(32)).toBe(2)
    expect(wav.readUInt16LE(34)).toBe(16)
    expect(wav.toString("ascii", 36, 40)).toBe("data")
    expect(wav.readUInt32LE(40)).toBe(320)
  })
})
