/**
 * 文件路径: src/recipe-views/recipe-views.controller.ts
 * 文件描述: 配方展示接口：购物清单、配方详情、技术视图，以及烘焙指南。
 */
import { Body, Controller, Get, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { RecipeFormDto } from './dto/recipe-form.dto';
import { RecipeViewsService } from './recipe-views.service';

@ApiTags('Recipe Views')
@Controller('recipe-views')
export class RecipeViewsController {
    constructor(private readonly recipeViewsService: RecipeViewsService) {}

    @Post()
    @HttpCode(HttpStatus.OK)
    @ApiOperation({ summary: '根据表单生成简易配方、配方详情与技术视图' })
    @ApiResponse({ status: 400, description: '表单超出界面允许的范围' })
    @ApiResponse({ status: 422, description: '烘焙百分比总和为 0，无法计算配方' })
    buildRecipeViews(@Body() recipeFormDto: RecipeFormDto) {
        return this.recipeViewsService.buildRecipeViews(recipeFormDto);
    }

    @Get('guides')
    @ApiOperation({ summary: '获取烘焙时间表、温度指南与常见问题' })
    getGuides() {
        return this.recipeViewsService.getGuides();
    }
}
