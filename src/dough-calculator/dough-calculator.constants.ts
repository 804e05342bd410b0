/**
 * 文件路径: src/dough-calculator/dough-calculator.constants.ts
 * 文件描述: 计算器默认输入与数值阈值。
 */
import { DoughCalculationInput, FormulaIngredient } from './interfaces/dough-calculation.interface';

export const DEFAULT_DOUGH_INPUT: Readonly<DoughCalculationInput> = Object.freeze({
    doughWeight: 900,
    sourdoughDiscardPercent: 30,
    prefermentPercent: 30,
    scale: 1,
    flour2Percent: 15,
    flour3Percent: 0,
    waterPercent: 72,
    saltPercent: 2,
    yeastPercent: 0.5,
    barleyMaltPercent: 3,
    inclusion2Percent: 0,
    inclusion3Percent: 0,
    discardFlourRatio: 100,
    discardWaterRatio: 100,
    prefermentFlourRatio: 100,
    prefermentWaterRatio: 100,
    prefermentYeastRatio: 1,
});

// 记忆化键的字段顺序，必须覆盖全部 17 个输入
export const DOUGH_INPUT_KEYS: readonly (keyof DoughCalculationInput)[] = [
    'doughWeight',
    'sourdoughDiscardPercent',
    'prefermentPercent',
    'scale',
    'flour2Percent',
    'flour3Percent',
    'waterPercent',
    'saltPercent',
    'yeastPercent',
    'barleyMaltPercent',
    'inclusion2Percent',
    'inclusion3Percent',
    'discardFlourRatio',
    'discardWaterRatio',
    'prefermentFlourRatio',
    'prefermentWaterRatio',
    'prefermentYeastRatio',
];

// 主面团中低于该重量的条目视为数值零（不是删除原料）
export const MAIN_DOUGH_EPSILON_GRAMS = 1e-9;

export const FLOUR_INGREDIENTS: readonly FormulaIngredient[] = [
    FormulaIngredient.STRONG_WHITE_FLOUR,
    FormulaIngredient.FLOUR_2,
    FormulaIngredient.FLOUR_3,
];
