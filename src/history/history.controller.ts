import { BadRequestException, Controller, Get, Header, Query } from '@nestjs/common';
import { HistoryService } from './history.service';

@Controller('analytics')
export class HistoryController {
  constructor(private readonly historyService: HistoryService) {}

  @Get('history')
  async getHistory(@Query('from') from?: string, @Query('to') to?: string) {
    return this.historyService.getHistory(from, to);
  }

  @Get('hourly')
  async getHourly(@Query('date') date?: string) {
    return this.historyService.getHourlyStats(date);
  }

  @Get('daily')
  async getDaily(@Query('from') from?: string, @Query('to') to?: string) {
    return this.historyService.getDailyStats(from, to);
  }

  @Get('export')
  @Header('Content-Type', 'text/csv')
  @Header('Content-Disposition', 'attachment; filename="footfall_export.csv"')
  async exportCsv(@Query('format') format?: string) {
    if (format && format !== 'csv') {
      throw new BadRequestException(`Unsupported export format: ${format}`);
    }
    return this.historyService.exportCsv();
  }
}
