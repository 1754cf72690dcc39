import { open } from 'fs/promises';

/**
 * Audio Utility Functions
 *
 * WAV (RIFF) helpers:
 * - raw PCM → WAV, for engines that hand back bare samples
 * - WAV header inspection, for duration probing (in memory or straight from
 *   disk without loading the samples)
 */

const WAVE_FORMAT_PCM = 1;
const WAVE_FORMAT_EXTENSIBLE = 0xfffe;

export interface WavInfo {
  audioFormat: number;
  channels: number;
  sampleRate: number;
  bitsPerSample: number;
  blockAlign: number;
  dataBytes: number;
  frames: number;
  duration: number;
}

/**
 * Convert raw PCM to WAV format
 *
 * @param pcmData - Raw signed PCM data (little-endian)
 * @param sampleRate - Sample rate in Hz
 * @returns WAV buffer with a 44-byte header
 */
export function pcmToWav(
  pcmData: Buffer,
  sampleRate: number = 16000,
  numChannels: number = 1,
  bitsPerSample: number = 16
): Buffer {
  const byteRate = (sampleRate * numChannels * bitsPerSample) / 8;
  const blockAlign = (numChannels * bitsPerSample) / 8;

  const headerSize = 44;
  const wavBuffer = Buffer.alloc(headerSize + pcmData.length);

  // RIFF header
  wavBuffer.write('RIFF', 0);
  wavBuffer.writeUInt32LE(36 + pcmData.length, 4); // File size - 8
  wavBuffer.write('WAVE', 8);

  // fmt subchunk
  wavBuffer.write('fmt ', 12);
  wavBuffer.writeUInt32LE(16, 16); // Subchunk1Size (16 for PCM)
  wavBuffer.writeUInt16LE(WAVE_FORMAT_PCM, 20);
  wavBuffer.writeUInt16LE(numChannels, 22);
  wavBuffer.writeUInt32LE(sampleRate, 24);
  wavBuffer.writeUInt32LE(byteRate, 28);
  wavBuffer.writeUInt16LE(blockAlign, 32);
  wavBuffer.writeUInt16LE(bitsPerSample, 34);

  // data subchunk
  wavBuffer.write('data', 36);
  wavBuffer.writeUInt32LE(pcmData.length, 40);

  pcmData.copy(wavBuffer, headerSize);

  return wavBuffer;
}

type WavFormat = Omit<WavInfo, 'dataBytes' | 'frames' | 'duration'>;

const RIFF_HEADER_SIZE = 12;
const CHUNK_HEADER_SIZE = 8;
const FMT_MIN_SIZE = 16;

function checkRiffHeader(header: Buffer): void {
  if (header.length < RIFF_HEADER_SIZE || header.toString('ascii', 0, 4) !== 'RIFF') {
    throw new Error('Invalid WAV file: missing RIFF header');
  }

  if (header.toString('ascii', 8, 12) !== 'WAVE') {
    throw new Error('Invalid WAV file: missing WAVE format');
  }
}

function parseFmt(body: Buffer): WavFormat {
  if (body.length < FMT_MIN_SIZE) {
    throw new Error('Invalid WAV file: truncated fmt chunk');
  }

  return {
    audioFormat: body.readUInt16LE(0),
    channels: body.readUInt16LE(2),
    sampleRate: body.readUInt32LE(4),
    blockAlign: body.readUInt16LE(12),
    bitsPerSample: body.readUInt16LE(14)
  };
}

function toWavInfo(format: WavFormat | undefined, dataBytes: number): WavInfo {
  if (!format) {
    throw new Error('Invalid WAV file: data chunk before fmt chunk');
  }
  if (format.audioFormat !== WAVE_FORMAT_PCM && format.audioFormat !== WAVE_FORMAT_EXTENSIBLE) {
    throw new Error(`Unsupported WAV format: ${format.audioFormat}`);
  }
  if (format.sampleRate === 0 || format.blockAlign === 0) {
    throw new Error('Invalid WAV file: zero sample rate or block size');
  }

  const frames = Math.floor(dataBytes / format.blockAlign);
  return {
    ...format,
    dataBytes,
    frames,
    duration: frames / format.sampleRate
  };
}

/**
 * Read format and length information from a WAV file
 *
 * Walks the RIFF chunks looking for `fmt ` and `data`; chunks are
 * word-aligned, so odd-sized chunks carry one pad byte.
 *
 * @throws Error when the buffer is not an uncompressed PCM WAV file
 */
export function readWavInfo(wavData: Buffer): WavInfo {
  checkRiffHeader(wavData);

  let offset = RIFF_HEADER_SIZE;
  let format: WavFormat | undefined;

  while (offset + CHUNK_HEADER_SIZE <= wavData.length) {
    const chunkId = wavData.toString('ascii', offset, offset + 4);
    const chunkSize = wavData.readUInt32LE(offset + 4);
    const bodyStart = offset + CHUNK_HEADER_SIZE;

    if (chunkId === 'fmt ') {
      format = parseFmt(wavData.subarray(bodyStart, bodyStart + FMT_MIN_SIZE));
    } else if (chunkId === 'data') {
      return toWavInfo(format, chunkSize);
    }

    offset = bodyStart + chunkSize + (chunkSize % 2);
  }

  throw new Error('Invalid WAV file: missing data chunk');
}

/**
 * Same as {@link readWavInfo}, reading only the chunk headers of a file on disk
 */
export async function readWavFileInfo(filePath: string): Promise<WavInfo> {
  const handle = await open(filePath, 'r');

  try {
    const { size } = await handle.stat();
    const readAt = async (position: number, length: number): Promise<Buffer> => {
      const buffer = Buffer.alloc(length);
      const { bytesRead } = await handle.read(buffer, 0, length, position);
      return buffer.subarray(0, bytesRead);
    };

    checkRiffHeader(await readAt(0, RIFF_HEADER_SIZE));

    let offset = RIFF_HEADER_SIZE;
    let format: WavFormat | undefined;

    while (offset + CHUNK_HEADER_SIZE <= size) {
      const chunkHeader = await readAt(offset, CHUNK_HEADER_SIZE);
      const chunkId = chunkHeader.toString('ascii', 0, 4);
      const chunkSize = chunkHeader.readUInt32LE(4);
      const bodyStart = offset + CHUNK_HEADER_SIZE;

      if (chunkId === 'fmt ') {
        format = parseFmt(await readAt(bodyStart, FMT_MIN_SIZE));
      } else if (chunkId === 'data') {
        return toWavInfo(format, chunkSize);
      }

      offset = bodyStart + chunkSize + (chunkSize % 2);
    }

    throw new Error('Invalid WAV file: missing data chunk');
  } finally {
    await handle.close();
  }
}
