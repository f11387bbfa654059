import { DecodeError } from '@errors/decode-error';

const decoder = new TextDecoder('utf-8', { fatal: true });

export function decodeUtf8(bytes: Uint8Array): string {
  try {
    return decoder.decode(bytes);
  } catch (error) {
    throw new DecodeError('object content is not valid utf-8', {
      cause: error,
    });
  }
}
