import { Module } from '@nestjs/common';
import { DoughCalculatorModule } from '../dough-calculator/dough-calculator.module';
import { RecipeViewsController } from './recipe-views.controller';
import { RecipeViewsService } from './recipe-views.service';

@Module({
    imports: [DoughCalculatorModule],
    controllers: [RecipeViewsController],
    providers: [RecipeViewsService],
})
export class RecipeViewsModule {}
