import { IsInt, IsNumber, IsOptional, Max, Min } from 'class-validator';

/** Partial threshold update; omitted fields keep their current value. */
export class SettingsDto {
  @IsOptional()
  @IsNumber()
  @Min(0)
  @Max(1)
  trackThresh?: number;

  @IsOptional()
  @IsNumber()
  @Min(0)
  @Max(1)
  matchThresh?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  trackBuffer?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  crowdModeThreshold?: number;

  @IsOptional()
  @IsNumber()
  @Min(0)
  highDensityThreshold?: number;
}
