import { Type } from 'class-transformer';
import { IsDefined, IsString, MaxLength, ValidateNested } from 'class-validator';
import { MAX_RAW_TEXT_LENGTH } from './validate-venue-request.dto';

export class VenueIdentityDto {
  @IsString()
  @MaxLength(MAX_RAW_TEXT_LENGTH)
  provider!: string;

  @IsString()
  @MaxLength(MAX_RAW_TEXT_LENGTH)
  id!: string;
}

export class CompareVenuesRequestDto {
  @IsDefined()
  @ValidateNested()
  @Type(() => VenueIdentityDto)
  left!: VenueIdentityDto;

  @IsDefined()
  @ValidateNested()
  @Type(() => VenueIdentityDto)
  right!: VenueIdentityDto;
}
