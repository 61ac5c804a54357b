import { Controller, Get, Header } from '@nestjs/common';
import { SheetUpdateService } from '../services/sheet-update.service';
import { CycleReport } from '../models/market-data';

export interface StatusResponse {
  running: boolean;
  lastCycle: CycleReport | null;
}

@Controller()
export class StatusController {
  constructor(private readonly sheetUpdateService: SheetUpdateService) {}

  @Get()
  @Header('Content-Type', 'text/plain')
  ping(): string {
    return 'Server running - Price tracker is active!';
  }

  @Get('status')
  status(): StatusResponse {
    return {
      running: this.sheetUpdateService.running,
      lastCycle: this.sheetUpdateService.lastCycle,
    };
  }
}
