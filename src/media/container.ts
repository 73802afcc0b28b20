/**
 * Audio containers recognised by their leading bytes
 */
export type AudioContainer = 'wav' | 'mp3' | 'ogg' | 'flac' | 'm4a' | 'unknown';

const PNG_SIGNATURE = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);

function asciiAt(file: Buffer, offset: number, length: number): string {
  if (file.length < offset + length) {
    return '';
  }
  return file.toString('ascii', offset, offset + length);
}

export function isPng(file: Buffer): boolean {
  return file.length >= PNG_SIGNATURE.length &&
    file.subarray(0, PNG_SIGNATURE.length).equals(PNG_SIGNATURE);
}

export function detectAudioContainer(file: Buffer): AudioContainer {
  if (asciiAt(file, 0, 4) === 'RIFF' && asciiAt(file, 8, 4) === 'WAVE') {
    return 'wav';
  }
  if (asciiAt(file, 0, 3) === 'ID3') {
    return 'mp3';
  }
  // MPEG audio frame sync: 11 set bits
  if (file.length >= 2 && file[0] === 0xff && (file[1] & 0xe0) === 0xe0) {
    return 'mp3';
  }
  if (asciiAt(file, 0, 4) === 'OggS') {
    return 'ogg';
  }
  if (asciiAt(file, 0, 4) === 'fLaC') {
    return 'flac';
  }
  if (asciiAt(file, 4, 4) === 'ftyp') {
    return 'm4a';
  }
  return 'unknown';
}

/**
 * True for containers that store lossy or entropy-coded samples
 */
export function isCompressedAudio(container: AudioContainer): boolean {
  return container === 'mp3' || container === 'ogg' || container === 'flac' || container === 'm4a';
}
