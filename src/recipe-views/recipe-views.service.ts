/**
 * 文件路径: src/recipe-views/recipe-views.service.ts
 * 文件描述: 展示层服务。解析表单（含简易/进阶模式），调用计算器，并生成三个视图。
 */
import { Injectable, UnprocessableEntityException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { MemoCache, readCacheCapacity } from '../common/cache/memo-cache';
import { DOUGH_INPUT_KEYS } from '../dough-calculator/dough-calculator.constants';
import { sumFlourWeight } from '../dough-calculator/dough-calculator.math';
import { DoughCalculatorService } from '../dough-calculator/dough-calculator.service';
import {
    DoughCalculationInput,
    DoughCalculationResult,
} from '../dough-calculator/interfaces/dough-calculation.interface';
import bakingGuides from './data/baking-guides.json';
import { BakingGuides, RecipeForm, RecipeViews } from './interfaces/recipe-views.interface';
import {
    buildFermentTables,
    buildFlourComposition,
    buildMasterFormula,
    buildShoppingList,
    discardHydrationPercent,
    resolveCalculationInput,
    roundToTenth,
} from './recipe-views.builders';

export const RECIPE_VIEW_CACHE_SIZE = 'RECIPE_VIEW_CACHE_SIZE';

type RenderedViews = Omit<RecipeViews, 'advanced'>;

const GUIDES: BakingGuides = bakingGuides;

@Injectable()
export class RecipeViewsService {
    private readonly cache: MemoCache<RenderedViews>;

    constructor(
        private readonly doughCalculatorService: DoughCalculatorService,
        configService: ConfigService,
    ) {
        this.cache = new MemoCache(readCacheCapacity(configService, RECIPE_VIEW_CACHE_SIZE, 128), RecipeViewsService.name);
    }

    buildRecipeViews(form: RecipeForm): RecipeViews {
        const input = resolveCalculationInput(form);
        const rendered = this.cache.getOrCompute(
            DOUGH_INPUT_KEYS.map((key) => input[key]),
            () => this.renderViews(input, this.doughCalculatorService.calculate(input)),
        );
        return { advanced: form.advanced ?? false, ...rendered };
    }

    /**
     * 计算结果为空（百分比总和为 0）时无法生成配方。
     */
    renderViews(input: DoughCalculationInput, result: DoughCalculationResult): RenderedViews {
        if (result.totalIngredients.length === 0) {
            throw new UnprocessableEntityException('无法计算配方，请检查输入的烘焙百分比。');
        }

        const discardHydration = discardHydrationPercent(input);
        const totalDoughWeight = result.mainDough.reduce((sum, line) => sum + line.weightInGrams, 0);
        const finalDough = result.mainDough.map((line) => ({ ...line, weightInGrams: roundToTenth(line.weightInGrams) }));
        const fermentTables = buildFermentTables(result.ferments, discardHydration);

        return {
            input,
            recipe: {
                totalDoughWeight,
                metrics: [
                    {
                        key: 'hydration',
                        label: 'Hydration',
                        percent: input.waterPercent,
                        help: 'Higher hydration gives a more open, chewier crumb',
                    },
                    { key: 'salt', label: 'Salt', percent: input.saltPercent, help: 'Balanced flavour enhancement' },
                    {
                        key: 'discard',
                        label: 'Discard Used',
                        percent: input.sourdoughDiscardPercent,
                        help: 'Waste nothing, gain flavour',
                    },
                    {
                        key: 'preferment',
                        label: 'Pre-ferment',
                        percent: input.prefermentPercent,
                        help: 'Complex artisan flavours',
                    },
                ],
                prefermentTotalWeight: result.prefermentTotalWeight,
                shoppingList: buildShoppingList(result.mainDough, input.flour2Percent, discardHydration),
            },
            details: {
                finalDough,
                totalDoughWeight: finalDough.reduce((sum, line) => sum + line.weightInGrams, 0),
                ferments: fermentTables,
            },
            technical: {
                masterFormula: buildMasterFormula(result.totalIngredients),
                fermentAnalysis: fermentTables,
                keyMetrics: {
                    preFermentedFlour: result.preFermentedFlour,
                    scale: input.scale,
                    totalFlourWeight: sumFlourWeight(result.totalIngredients),
                    effectiveHydrationPercent: input.waterPercent,
                },
                flourComposition: buildFlourComposition(input.flour2Percent, input.flour3Percent),
            },
        };
    }

    getGuides(): BakingGuides {
        return GUIDES;
    }
}
