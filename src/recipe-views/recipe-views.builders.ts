/**
 * 文件路径: src/recipe-views/recipe-views.builders.ts
 * 文件描述: 把计算结果整理成展示用的数据。这里的显示阈值 (0.1g / 1g) 比计算器的 1e-9 宽松，只影响展示。
 */
import { DEFAULT_DOUGH_INPUT } from '../dough-calculator/dough-calculator.constants';
import {
    DoughCalculationInput,
    FermentBreakdown,
    FermentName,
    FormulaIngredient,
    FormulaLine,
    MainDoughItem,
    WeightLine,
} from '../dough-calculator/interfaces/dough-calculation.interface';
import { FermentTable, FlourShare, MasterFormula, RecipeForm, ShoppingListItem } from './interfaces/recipe-views.interface';

export const DISPLAY_THRESHOLD_GRAMS = 0.1;
export const SHOPPING_LIST_THRESHOLD_GRAMS = 1;

const BASIC_FORM_KEYS = [
    'doughWeight',
    'waterPercent',
    'saltPercent',
    'sourdoughDiscardPercent',
    'prefermentPercent',
] as const;

const ADVANCED_FORM_KEYS = [
    'scale',
    'yeastPercent',
    'barleyMaltPercent',
    'flour2Percent',
    'flour3Percent',
    'inclusion2Percent',
    'inclusion3Percent',
    'discardFlourRatio',
    'discardWaterRatio',
    'prefermentFlourRatio',
    'prefermentWaterRatio',
    'prefermentYeastRatio',
] as const;

/**
 * 简易模式下忽略所有进阶输入，一律使用默认值；计算器本身不知道输入来自用户还是默认值。
 */
export function resolveCalculationInput(form: RecipeForm): DoughCalculationInput {
    const resolved: DoughCalculationInput = { ...DEFAULT_DOUGH_INPUT };
    const keys = form.advanced ? [...BASIC_FORM_KEYS, ...ADVANCED_FORM_KEYS] : BASIC_FORM_KEYS;
    for (const key of keys) {
        const value = form[key];
        if (value !== undefined) {
            resolved[key] = value;
        }
    }
    return resolved;
}

// 弃种含水量 = 水 / 面粉；面粉比例 <= 0 时无意义
export function discardHydrationPercent(input: DoughCalculationInput): number | null {
    if (input.discardFlourRatio <= 0) {
        return null;
    }
    return (input.discardWaterRatio / input.discardFlourRatio) * 100;
}

function formatPercent(value: number): string {
    return value.toFixed(0);
}

export function buildShoppingList(
    mainDough: readonly WeightLine<MainDoughItem>[],
    flour2Percent: number,
    discardHydration: number | null,
): ShoppingListItem[] {
    return mainDough
        .filter((line) => line.weightInGrams > SHOPPING_LIST_THRESHOLD_GRAMS)
        .map((line) => ({
            label: shoppingLabel(line.name, flour2Percent, discardHydration),
            weightInGrams: line.weightInGrams,
        }));
}

function shoppingLabel(name: MainDoughItem, flour2Percent: number, discardHydration: number | null): string {
    switch (name) {
        case FormulaIngredient.STRONG_WHITE_FLOUR:
            return 'Strong white bread flour';
        case FormulaIngredient.FLOUR_2:
            return `Alternative flour (${formatPercent(flour2Percent)}% of total)`;
        case FermentName.SOURDOUGH_DISCARD:
            return discardHydration === null
                ? 'Sourdough discard'
                : `Sourdough discard (${formatPercent(discardHydration)}% hydration)`;
        case FermentName.PRE_FERMENT:
            return 'Pre-ferment (prepare night before)';
        case FormulaIngredient.BARLEY_MALT_EXTRACT:
            return 'Barley malt extract (or honey)';
        default:
            return name;
    }
}

export function buildFermentTables(
    ferments: readonly FermentBreakdown[],
    discardHydration: number | null,
): FermentTable[] {
    const tables: FermentTable[] = [];
    for (const ferment of ferments) {
        const rows = ferment.components.filter((component) => component.weightInGrams > DISPLAY_THRESHOLD_GRAMS);
        if (rows.length === 0) {
            continue;
        }
        const totalWeight = rows.reduce((sum, row) => sum + row.weightInGrams, 0);
        if (ferment.name === FermentName.SOURDOUGH_DISCARD) {
            tables.push({
                name: ferment.name,
                note: 'use directly from fridge',
                caption:
                    discardHydration === null
                        ? 'Your regular sourdough discard'
                        : `Your regular sourdough discard at ${formatPercent(discardHydration)}% hydration`,
                rows,
                totalWeight,
            });
        } else {
            tables.push({
                name: ferment.name,
                note: 'make night before',
                caption: 'Mix and ferment 8-12 hours at room temperature',
                rows,
                totalWeight,
            });
        }
    }
    return tables;
}

export function buildMasterFormula(totalIngredients: readonly FormulaLine[]): MasterFormula {
    const rows = totalIngredients.filter((line) => line.weightInGrams > DISPLAY_THRESHOLD_GRAMS);
    return {
        rows,
        totalBakersPercent: rows.reduce((sum, row) => sum + row.bakersPercent, 0),
        totalWeight: rows.reduce((sum, row) => sum + row.weightInGrams, 0),
    };
}

export function buildFlourComposition(flour2Percent: number, flour3Percent: number): FlourShare[] {
    const composition: FlourShare[] = [{ label: 'Strong white', percent: 100 - flour2Percent - flour3Percent }];
    if (flour2Percent > 0) {
        composition.push({ label: 'Alternative', percent: flour2Percent });
    }
    if (flour3Percent > 0) {
        composition.push({ label: 'Third flour', percent: flour3Percent });
    }
    return composition;
}

export function roundToTenth(value: number): number {
    return Math.round(value * 10) / 10;
}
