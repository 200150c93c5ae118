import { Module } from '@nestjs/common';
import { StockCodeService } from './stock-code.service';

@Module({
  providers: [StockCodeService],
  exports: [StockCodeService],
})
export class StockCodeModule {}
