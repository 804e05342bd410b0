import { Module } from '@nestjs/common';
import { DoughCalculatorController } from './dough-calculator.controller';
import { DoughCalculatorService } from './dough-calculator.service';

@Module({
    controllers: [DoughCalculatorController],
    providers: [DoughCalculatorService],
    exports: [DoughCalculatorService], // 供展示层模块注入
})
export class DoughCalculatorModule {}
