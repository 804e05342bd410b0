/**
 * 文件路径: src/recipe-views/dto/recipe-form.dto.ts
 * 文件描述: 配方表单。界面层的取值范围在这里校验，计算器本身不做任何范围限制。
 */
import { IsBoolean, IsDivisibleBy, IsNumber, IsOptional, Max, Min, ValidateIf } from 'class-validator';
import { ApiPropertyOptional } from '@nestjs/swagger';
import { RecipeForm } from '../interfaces/recipe-views.interface';

// 简易模式下进阶字段会被替换为默认值，只在进阶模式且有传值时校验
function isAdvancedInput(form: RecipeFormDto, value: unknown): boolean {
    return form.advanced === true && value !== undefined;
}

export class RecipeFormDto implements RecipeForm {
    @ApiPropertyOptional({ description: '目标面团重量 (g)', default: 900, minimum: 100 })
    @IsNumber()
    @Min(100)
    @IsOptional()
    doughWeight?: number;

    @ApiPropertyOptional({ description: '含水量 (%)', default: 72, minimum: 50, maximum: 100 })
    @IsNumber()
    @Min(50)
    @Max(100)
    @IsOptional()
    waterPercent?: number;

    @ApiPropertyOptional({ description: '盐 (%)', default: 2, minimum: 1, maximum: 5 })
    @IsNumber()
    @Min(1)
    @Max(5)
    @IsOptional()
    saltPercent?: number;

    // 滑块以 5% 为步长
    @ApiPropertyOptional({ default: 30, minimum: 0, maximum: 50, multipleOf: 5 })
    @IsNumber()
    @Min(0)
    @Max(50)
    @IsDivisibleBy(5)
    @IsOptional()
    sourdoughDiscardPercent?: number;

    @ApiPropertyOptional({ default: 30, minimum: 0, maximum: 50, multipleOf: 5 })
    @IsNumber()
    @Min(0)
    @Max(50)
    @IsDivisibleBy(5)
    @IsOptional()
    prefermentPercent?: number;

    @ApiPropertyOptional({ description: '进阶模式：为 false 时以下字段全部使用默认值', default: false })
    @IsBoolean()
    @IsOptional()
    advanced?: boolean;

    @ApiPropertyOptional({ default: 1, minimum: 0.1 })
    @IsNumber()
    @Min(0.1)
    @ValidateIf(isAdvancedInput)
    scale?: number;

    @ApiPropertyOptional({ default: 0.5, minimum: 0 })
    @IsNumber()
    @Min(0)
    @ValidateIf(isAdvancedInput)
    yeastPercent?: number;

    @ApiPropertyOptional({ default: 3, minimum: 0 })
    @IsNumber()
    @Min(0)
    @ValidateIf(isAdvancedInput)
    barleyMaltPercent?: number;

    @ApiPropertyOptional({ description: '替代面粉 (%)', default: 15, minimum: 0 })
    @IsNumber()
    @Min(0)
    @ValidateIf(isAdvancedInput)
    flour2Percent?: number;

    @ApiPropertyOptional({ default: 0, minimum: 0 })
    @IsNumber()
    @Min(0)
    @ValidateIf(isAdvancedInput)
    flour3Percent?: number;

    @ApiPropertyOptional({ description: '种子/坚果 (%)', default: 0, minimum: 0 })
    @IsNumber()
    @Min(0)
    @ValidateIf(isAdvancedInput)
    inclusion2Percent?: number;

    @ApiPropertyOptional({ description: '果干 (%)', default: 0, minimum: 0 })
    @IsNumber()
    @Min(0)
    @ValidateIf(isAdvancedInput)
    inclusion3Percent?: number;

    @ApiPropertyOptional({ default: 100 })
    @IsNumber()
    @ValidateIf(isAdvancedInput)
    discardFlourRatio?: number;

    @ApiPropertyOptional({ default: 100 })
    @IsNumber()
    @ValidateIf(isAdvancedInput)
    discardWaterRatio?: number;

    @ApiPropertyOptional({ default: 100 })
    @IsNumber()
    @ValidateIf(isAdvancedInput)
    prefermentFlourRatio?: number;

    @ApiPropertyOptional({ default: 100 })
    @IsNumber()
    @ValidateIf(isAdvancedInput)
    prefermentWaterRatio?: number;

    @ApiPropertyOptional({ default: 1 })
    @IsNumber()
    @ValidateIf(isAdvancedInput)
    prefermentYeastRatio?: number;
}
