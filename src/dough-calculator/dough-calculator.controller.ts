/**
 * 文件路径: src/dough-calculator/dough-calculator.controller.ts
 * 文件描述: 面团计算器的原始 JSON 接口。
 */
import { Body, Controller, Get, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { DoughCalculatorService } from './dough-calculator.service';
import { CalculateDoughDto } from './dto/calculate-dough.dto';

@ApiTags('Dough Calculator')
@Controller('dough-calculator')
export class DoughCalculatorController {
    constructor(private readonly doughCalculatorService: DoughCalculatorService) {}

    @Post('calculate')
    @HttpCode(HttpStatus.OK)
    @ApiOperation({ summary: '根据烘焙百分比计算总配方、主面团与发酵物重量' })
    @ApiResponse({ status: 200, description: '百分比总和为 0 时返回空列表与 0 值' })
    calculate(@Body() calculateDoughDto: CalculateDoughDto) {
        return this.doughCalculatorService.calculate(calculateDoughDto);
    }

    @Get('defaults')
    @ApiOperation({ summary: '获取默认输入' })
    getDefaults() {
        return this.doughCalculatorService.getDefaults();
    }
}
