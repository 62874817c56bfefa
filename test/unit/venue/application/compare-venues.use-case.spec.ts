import { UnprocessableEntityException } from '@nestjs/common';
import { CompareVenuesUseCase } from '@/modules/venue/application/use-cases/compare-venues';
import { captureErrorOf } from '../../../helpers/capture-error';

describe('CompareVenuesUseCase', () => {
  const useCase = new CompareVenuesUseCase();

  it('matches identities after cleaning', () => {
    expect(
      useCase.execute({
        left: { provider: 'foursquare', id: 'abc123' },
        right: { provider: ' foursquare\r', id: 'abc123\t' },
      }),
    ).toEqual({ ok: true, sameProviderId: true });
  });

  it('compares case-sensitively', () => {
    expect(
      useCase.execute({
        left: { provider: 'foursquare', id: 'abc123' },
        right: { provider: 'Foursquare', id: 'abc123' },
      }),
    ).toEqual({ ok: true, sameProviderId: false });
  });

  it('treats a different id as a different place', () => {
    expect(
      useCase.execute({
        left: { provider: 'gplaces', id: 'one' },
        right: { provider: 'gplaces', id: 'two' },
      }),
    ).toEqual({ ok: true, sameProviderId: false });
  });

  it('rejects a lone surrogate in an identity field', () => {
    const error = captureErrorOf(
      () =>
        useCase.execute({
          left: { provider: 'foursquare', id: '\uD800' },
          right: { provider: 'foursquare', id: 'abc123' },
        }),
      UnprocessableEntityException,
    );

    expect(error.getResponse()).toEqual({
      message: 'Venue identifier must be encoded in UTF-8',
      code: 'INVALID_ID',
    });
  });
});
