import { Type } from 'class-transformer';
import {
  IsArray,
  IsBase64,
  IsInt,
  IsNumber,
  IsOptional,
  IsString,
  Max,
  Min,
  ValidateNested,
} from 'class-validator';

export class DetectionDto {
  @IsNumber()
  left!: number;

  @IsNumber()
  top!: number;

  @IsNumber()
  right!: number;

  @IsNumber()
  bottom!: number;

  @IsNumber()
  @Min(0)
  @Max(1)
  confidence!: number;

  @IsOptional()
  @IsInt()
  classId?: number;

  @IsOptional()
  @IsInt()
  class_id?: number;
}

/** One frame posted by a client; `pixels` is base64 RGBA, row-major. */
export class FrameDto {
  @IsOptional()
  @IsString()
  cameraId?: string;

  @IsInt()
  @Min(0)
  width!: number;

  @IsInt()
  @Min(0)
  height!: number;

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => DetectionDto)
  detections!: DetectionDto[];

  @IsOptional()
  @IsBase64()
  pixels?: string;
}
