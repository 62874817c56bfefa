import { IsNumber, IsOptional, IsString, Matches } from 'class-validator';

export const ACCESS_HASH_PATTERN = /^-?\d{1,19}$/;

// Non-finite values are accepted here: the domain turns them into an empty location
// or a zero accuracy.
const ALLOW_NON_FINITE = { allowInfinity: true };

export class LocationInputDto {
  @IsNumber(ALLOW_NON_FINITE)
  latitude!: number;

  @IsNumber(ALLOW_NON_FINITE)
  longitude!: number;

  @IsOptional()
  @IsNumber(ALLOW_NON_FINITE)
  horizontalAccuracy?: number;

  // int64 does not survive a JSON number, so it travels as a decimal string.
  @IsOptional()
  @IsString()
  @Matches(ACCESS_HASH_PATTERN)
  accessHash?: string;
}
