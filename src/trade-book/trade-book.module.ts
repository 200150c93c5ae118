import { Module } from '@nestjs/common';
import { StockCodeModule } from '../stock-code/stock-code.module';
import { APP_CONFIG, AppConfig } from '../config/app-config';
import { NETTING_POLICY, createNettingPolicy } from './netting';
import { TradeBookStorageService } from './trade-book-storage.service';
import { TradeBookFileService } from './trade-book-file.service';
import { TradeBookService } from './trade-book.service';
import { TradeValidatorService } from './trade-validator.service';
import { OrderProcessorService } from './order-processor.service';

@Module({
  imports: [StockCodeModule], // Import to access StockCodeService
  providers: [
    {
      provide: NETTING_POLICY,
      useFactory: (config: AppConfig) => createNettingPolicy(config.nettingPolicy),
      inject: [APP_CONFIG],
    },
    TradeBookStorageService,
    TradeBookFileService,
    TradeBookService,       // Ledger: reconcile, seed, persist
    TradeValidatorService,
    OrderProcessorService,  // Parse -> validate -> reconcile -> persist
  ],
  exports: [OrderProcessorService],
})
export class TradeBookModule {}
