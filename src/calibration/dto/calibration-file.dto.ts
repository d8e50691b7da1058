import { Type } from 'class-transformer';
import { IsArray, IsOptional, ValidateNested } from 'class-validator';
import { CountingLineDto } from './counting-line.dto';
import { SettingsDto } from './settings.dto';
import { ZoneDto } from './zone.dto';

/** Shape of the calibration JSON file. */
export class CalibrationFileDto {
  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => ZoneDto)
  zones?: ZoneDto[];

  @IsOptional()
  @ValidateNested()
  @Type(() => CountingLineDto)
  countingLine?: CountingLineDto;

  @IsOptional()
  @ValidateNested()
  @Type(() => SettingsDto)
  settings?: SettingsDto;
}
