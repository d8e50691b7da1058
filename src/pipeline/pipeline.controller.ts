import { Body, Controller, Get, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { FrameDto } from './dto/frame.dto';
import { decodePixels } from './frame-decoder';
import { PipelineService } from './pipeline.service';

@Controller()
export class PipelineController {
  constructor(private readonly pipelineService: PipelineService) {}

  @Get('analytics')
  getAnalytics() {
    return this.pipelineService.getSnapshot();
  }

  @Get('analytics/status')
  getStatus() {
    return this.pipelineService.getStatus();
  }

  @Post('analytics/reset')
  @HttpCode(HttpStatus.OK)
  reset() {
    return { status: this.pipelineService.reset() };
  }

  @Post('frames')
  @HttpCode(HttpStatus.OK)
  async submitFrame(@Body() frame: FrameDto) {
    const outcome = await this.pipelineService.submitFrame({
      cameraId: frame.cameraId,
      width: frame.width,
      height: frame.height,
      detections: frame.detections,
      image: decodePixels(frame.pixels, frame.width, frame.height),
    });
    return { outcome };
  }
}
