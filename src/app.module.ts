import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { AppController } from './app.controller';
import { AppService } from './app.service';
import { DoughCalculatorModule } from './dough-calculator/dough-calculator.module';
import { RecipeViewsModule } from './recipe-views/recipe-views.module';

@Module({
    imports: [ConfigModule.forRoot({ isGlobal: true }), DoughCalculatorModule, RecipeViewsModule],
    controllers: [AppController],
    providers: [AppService],
})
export class AppModule {}
