import { BadRequestException } from '@nestjs/common';
import { decodeTextField } from '@/modules/venue/application/use-cases/shared';
import { captureErrorOf } from '../../../helpers/capture-error';

describe('decodeTextField', () => {
  it('passes utf8 text through as a string', () => {
    expect(decodeTextField('title', 'Cafe Pushkin', 'utf8')).toBe('Cafe Pushkin');
  });

  it('decodes base64 to raw bytes', () => {
    const decoded = decodeTextField('title', 'SGk=', 'base64');

    expect(decoded).toEqual(Buffer.from([0x48, 0x69]));
  });

  it('keeps malformed UTF-8 bytes intact', () => {
    const decoded = decodeTextField('title', '/w==', 'base64');

    expect(decoded).toEqual(Buffer.from([0xff]));
  });

  it('decodes an empty base64 field to no bytes', () => {
    expect(decodeTextField('id', '', 'base64')).toEqual(Buffer.alloc(0));
  });

  it.each(['not base64!', 'SGk', 'S=Gk'])('rejects %p', (value) => {
    const error = captureErrorOf(() => decodeTextField('address', value, 'base64'), BadRequestException);

    expect(error.message).toBe('Invalid address: must be base64 encoded');
  });
});
