import { Module } from '@nestjs/common';
import { TradeBookModule } from '../trade-book/trade-book.module';
import { OrderRunnerService } from './order-runner.service';

@Module({
  imports: [TradeBookModule],
  providers: [OrderRunnerService],
  exports: [OrderRunnerService],
})
export class CliModule {}
