import { Injectable, Inject, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ExchangeApiInterface } from './exchange-api.interface';
import { PriceAggregatorService } from './price-aggregator.service';
import { SheetWriterInterface } from '../sheets/sheet-writer.interface';
import { formatUtcTimestamp } from '../sheets/sheet-grid';
import { CycleReport } from '../models/market-data';
import { errorMessage } from '../models/price-feed.errors';

@Injectable()
export class SheetUpdateService implements OnModuleDestroy {
  private readonly logger = new Logger(SheetUpdateService.name);
  private readonly updateIntervalMs: number;
  private readonly continueOnError: boolean;
  private timer: NodeJS.Timeout | null = null;
  private isRunning = false;
  private completion: Promise<void> | null = null;
  private settle: (() => void) | null = null;
  private lastReport: CycleReport | null = null;
  private generation = 0;
  private inFlight: Promise<CycleReport> | null = null;

  constructor(
    @Inject(ExchangeApiInterface) private readonly exchangeApi: ExchangeApiInterface,
    private readonly aggregator: PriceAggregatorService,
    @Inject(SheetWriterInterface) private readonly sheetWriter: SheetWriterInterface,
    private readonly configService: ConfigService,
  ) {
    this.updateIntervalMs = this.configService.get<number>('UPDATE_INTERVAL_MS', 5000);
    this.continueOnError = this.configService.get<boolean>('CONTINUE_ON_ERROR', false);
  }

  get running(): boolean {
    return this.isRunning;
  }

  get lastCycle(): CycleReport | null {
    return this.lastReport;
  }

  /**
   * Runs update cycles until {@link stop} is called, pausing `UPDATE_INTERVAL_MS`
   * after each one. Resolves on stop; rejects with the failing cycle's error
   * unless `CONTINUE_ON_ERROR` is set.
   */
  start(): Promise<void> {
    if (this.isRunning && this.completion) {
      this.logger.warn('Sheet update service is already running');
      return this.completion;
    }

    this.isRunning = true;
    const generation = ++this.generation;
    // A cycle still in flight from an earlier start() must not reschedule itself.
    const isCurrent = () => this.isRunning && generation === this.generation;
    this.logger.log(`Starting sheet update service (pause: ${this.updateIntervalMs} ms)...`);

    this.completion = new Promise<void>((resolve, reject) => {
      this.settle = resolve;

      const runUpdate = async () => {
        const cycle = this.runCycle();
        this.inFlight = cycle;
        try {
          await cycle;
        } catch (error) {
          if (!isCurrent()) {
            this.logger.error(`Update cycle failed after stop: ${errorMessage(error)}`);
            reject(error);
            return;
          }
          if (!this.continueOnError) {
            this.logger.error(`Update cycle failed, stopping: ${errorMessage(error)}`);
            this.halt();
            reject(error);
            return;
          }
          this.logger.error(`Update cycle failed: ${errorMessage(error)}`);
        } finally {
          if (this.inFlight === cycle) {
            this.inFlight = null;
          }
        }

        if (isCurrent()) {
          this.timer = setTimeout(() => {
            runUpdate().catch(reject);
          }, this.updateIntervalMs);
        }
      };

      // A cycle left over from before stop() finishes first; its outcome is
      // reported by the run that started it.
      const previous = this.inFlight ?? Promise.resolve();
      previous
        .then(
          () => undefined,
          () => undefined,
        )
        .then(() => (isCurrent() ? runUpdate() : undefined))
        .catch(reject);
    });

    return this.completion;
  }

  /** One fetch, aggregate and write pass over a freshly listed symbol set. */
  async runCycle(): Promise<CycleReport> {
    const symbols = await this.exchangeApi.listQuotePairs();
    const { prices, closes } = await this.aggregator.aggregate(symbols);

    const timestamp = formatUtcTimestamp(new Date());
    await this.sheetWriter.write(symbols, prices, closes, timestamp);

    this.logger.log(`[${timestamp}] Google Sheet updated successfully!`);
    this.lastReport = { symbols: symbols.length, updatedAt: timestamp };
    return this.lastReport;
  }

  stop(): void {
    if (!this.isRunning) {
      this.logger.warn('Sheet update service is not running');
      return;
    }

    const settle = this.settle;
    this.halt();
    settle?.();
    this.logger.log('Sheet update service stopped');
  }

  onModuleDestroy(): void {
    if (this.isRunning) {
      this.stop();
    }
  }

  private halt(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.isRunning = false;
    this.settle = null;
  }
}
