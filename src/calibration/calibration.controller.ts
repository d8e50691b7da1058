import { Body, Controller, Delete, Get, HttpCode, HttpStatus, Param, Post, Put } from '@nestjs/common';
import { CalibrationService } from './calibration.service';
import { CountingLineDto, SettingsDto, ZoneDto } from './dto';

@Controller()
export class CalibrationController {
  constructor(private readonly calibrationService: CalibrationService) {}

  @Get('zones')
  getZones() {
    return this.calibrationService.getZones();
  }

  @Post('zones')
  async upsertZone(@Body() zone: ZoneDto) {
    return this.calibrationService.upsertZone(zone);
  }

  @Delete('zones/:id')
  @HttpCode(HttpStatus.NO_CONTENT)
  async deleteZone(@Param('id') id: string) {
    await this.calibrationService.deleteZone(id);
  }

  @Get('counting-line')
  getCountingLine() {
    return this.calibrationService.getCountingLine();
  }

  @Put('counting-line')
  async setCountingLine(@Body() line: CountingLineDto) {
    return this.calibrationService.setCountingLine(line);
  }

  @Get('settings')
  getSettings() {
    return this.calibrationService.getThresholds();
  }

  @Put('settings')
  async updateSettings(@Body() settings: SettingsDto) {
    return this.calibrationService.updateThresholds(settings);
  }
}
