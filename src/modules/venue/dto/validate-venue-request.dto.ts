import { Type } from 'class-transformer';
import { IsDefined, IsIn, IsOptional, IsString, MaxLength, ValidateNested } from 'class-validator';
import { LocationInputDto } from './location-input.dto';

export const TEXT_ENCODINGS = ['utf8', 'base64'] as const;

export type TextEncoding = (typeof TEXT_ENCODINGS)[number];

// Bounds the work done before cleaning; cleaning itself caps at 35 000 code points.
export const MAX_RAW_TEXT_LENGTH = 200_000;

export class ValidateVenueRequestDto {
  @IsDefined()
  @ValidateNested()
  @Type(() => LocationInputDto)
  location!: LocationInputDto;

  @IsString()
  @MaxLength(MAX_RAW_TEXT_LENGTH)
  title!: string;

  @IsString()
  @MaxLength(MAX_RAW_TEXT_LENGTH)
  address!: string;

  @IsString()
  @MaxLength(MAX_RAW_TEXT_LENGTH)
  provider!: string;

  @IsString()
  @MaxLength(MAX_RAW_TEXT_LENGTH)
  id!: string;

  @IsString()
  @MaxLength(MAX_RAW_TEXT_LENGTH)
  type!: string;

  /** `base64` lets callers submit raw bytes, malformed UTF-8 included. */
  @IsOptional()
  @IsIn(TEXT_ENCODINGS)
  encoding?: TextEncoding;
}
