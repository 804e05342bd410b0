/**
 * 文件路径: src/dough-calculator/dto/calculate-dough.dto.ts
 * 文件描述: 原始计算接口的请求体。这里只校验类型，不限制范围，负数等输入按算术原样传递。
 *          请求体为 JSON，不做类型转换。
 */
import { IsNumber } from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';
import { DoughCalculationInput } from '../interfaces/dough-calculation.interface';

export class CalculateDoughDto implements DoughCalculationInput {
    @ApiProperty({ description: '目标面团总重 (g)', example: 900 })
    @IsNumber()
    doughWeight!: number;

    @ApiProperty({ description: '鲁邦种弃种占总面粉的百分比', example: 30 })
    @IsNumber()
    sourdoughDiscardPercent!: number;

    @ApiProperty({ description: '预发酵面种占总面粉的百分比', example: 30 })
    @IsNumber()
    prefermentPercent!: number;

    @ApiProperty({ description: '整体缩放倍数', example: 1 })
    @IsNumber()
    scale!: number;

    @ApiProperty({ example: 15 })
    @IsNumber()
    flour2Percent!: number;

    @ApiProperty({ example: 0 })
    @IsNumber()
    flour3Percent!: number;

    @ApiProperty({ description: '含水量 (烘焙百分比)', example: 72 })
    @IsNumber()
    waterPercent!: number;

    @ApiProperty({ example: 2 })
    @IsNumber()
    saltPercent!: number;

    @ApiProperty({ example: 0.5 })
    @IsNumber()
    yeastPercent!: number;

    @ApiProperty({ example: 3 })
    @IsNumber()
    barleyMaltPercent!: number;

    @ApiProperty({ example: 0 })
    @IsNumber()
    inclusion2Percent!: number;

    @ApiProperty({ example: 0 })
    @IsNumber()
    inclusion3Percent!: number;

    @ApiProperty({ description: '弃种内部面粉比例', example: 100 })
    @IsNumber()
    discardFlourRatio!: number;

    @ApiProperty({ description: '弃种内部水比例', example: 100 })
    @IsNumber()
    discardWaterRatio!: number;

    @ApiProperty({ example: 100 })
    @IsNumber()
    prefermentFlourRatio!: number;

    @ApiProperty({ example: 100 })
    @IsNumber()
    prefermentWaterRatio!: number;

    @ApiProperty({ example: 1 })
    @IsNumber()
    prefermentYeastRatio!: number;
}
