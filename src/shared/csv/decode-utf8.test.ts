import { DecodeError } from '@errors/decode-error';
import { decodeUtf8 } from './decode-utf8';

describe('decode-utf8', () => {
  it('should decode utf-8 content', () => {
    const bytes = new TextEncoder().encode('asset_id,site\na1,Zürich\n');

    expect(decodeUtf8(bytes)).toEqual('asset_id,site\na1,Zürich\n');
  });

  it('should drop a leading byte order mark', () => {
    const bytes = Uint8Array.from([0xef, 0xbb, 0xbf, 0x61, 0x62]);

    expect(decodeUtf8(bytes)).toEqual('ab');
  });

  it('should throw a decode error for invalid byte sequences', () => {
    const bytes = Uint8Array.from([0x61, 0xff, 0x62]);

    expect(() => decodeUtf8(bytes)).toThrow(DecodeError);
  });
});
