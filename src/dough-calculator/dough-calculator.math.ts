/**
 * 文件路径: src/dough-calculator/dough-calculator.math.ts
 * 文件描述: 面团配方的纯计算逻辑。总面团重量按各原料百分比占百分比总和的份额分配，
 *          而不是传统烘焙百分比公式（面粉固定 100%，其余按面粉推算）。该归一化方式需要原样保留。
 */
import { FLOUR_INGREDIENTS, MAIN_DOUGH_EPSILON_GRAMS } from './dough-calculator.constants';
import {
    DoughCalculationInput,
    DoughCalculationResult,
    FermentComponent,
    FermentName,
    FormulaIngredient,
    FormulaLine,
    MainDoughItem,
    WeightLine,
} from './interfaces/dough-calculation.interface';

const EMPTY_RESULT: DoughCalculationResult = Object.freeze({
    totalIngredients: [],
    mainDough: [],
    ferments: [],
    preFermentedFlour: 0,
    sourdoughDiscardTotalWeight: 0,
    prefermentTotalWeight: 0,
});

/**
 * 按比例拆分发酵物总重。比例总和 <= 0 时所有组分均为 0。
 */
export function apportion(totalWeight: number, ratios: readonly number[]): number[] {
    const ratioSum = ratios.reduce((sum, ratio) => sum + ratio, 0);
    if (ratioSum <= 0) {
        return ratios.map(() => 0);
    }
    return ratios.map((ratio) => (totalWeight / ratioSum) * ratio);
}

export function sumFlourWeight(totalIngredients: readonly FormulaLine[]): number {
    return totalIngredients
        .filter((line) => FLOUR_INGREDIENTS.includes(line.name))
        .reduce((sum, line) => sum + line.weightInGrams, 0);
}

export function calculateDough(input: DoughCalculationInput): DoughCalculationResult {
    const strongWhiteFlourPercent = 100 - input.flour2Percent - input.flour3Percent;

    const bakersPercents: [FormulaIngredient, number][] = [
        [FormulaIngredient.STRONG_WHITE_FLOUR, strongWhiteFlourPercent],
        [FormulaIngredient.FLOUR_2, input.flour2Percent],
        [FormulaIngredient.FLOUR_3, input.flour3Percent],
        [FormulaIngredient.WATER, input.waterPercent],
        [FormulaIngredient.SALT, input.saltPercent],
        [FormulaIngredient.YEAST, input.yeastPercent],
        [FormulaIngredient.BARLEY_MALT_EXTRACT, input.barleyMaltPercent],
        [FormulaIngredient.INCLUSION_2, input.inclusion2Percent],
        [FormulaIngredient.INCLUSION_3, input.inclusion3Percent],
    ];
    const totalBakersPercent = bakersPercents.reduce((sum, [, percent]) => sum + percent, 0);

    // 唯一的退化路径：百分比总和为 0 时返回空结果，而不是除零
    if (totalBakersPercent === 0) {
        return EMPTY_RESULT;
    }

    const totalIngredients: FormulaLine[] = bakersPercents.map(([name, bakersPercent]) => ({
        name,
        bakersPercent,
        weightInGrams: (input.doughWeight / totalBakersPercent) * bakersPercent * input.scale,
    }));
    const weights = new Map(totalIngredients.map((line) => [line.name, line.weightInGrams]));
    const weightOf = (name: FormulaIngredient): number => weights.get(name) ?? 0;

    const totalFlourWeight = sumFlourWeight(totalIngredients);

    // 发酵物总重按总面粉重量计算，不使用上面的百分比总和
    const sourdoughDiscardTotalWeight = totalFlourWeight * (input.sourdoughDiscardPercent / 100);
    const prefermentTotalWeight = totalFlourWeight * (input.prefermentPercent / 100);

    const [discardFlour, discardWater] = apportion(sourdoughDiscardTotalWeight, [
        input.discardFlourRatio,
        input.discardWaterRatio,
    ]);
    const [prefermentFlour, prefermentWater, prefermentYeast] = apportion(prefermentTotalWeight, [
        input.prefermentFlourRatio,
        input.prefermentWaterRatio,
        input.prefermentYeastRatio,
    ]);

    const preFermentedFlour = discardFlour + prefermentFlour;

    // 发酵物消耗的面粉和水只从高筋白面粉和水中扣除；酵母只由预发酵面种扣除
    const mainDoughDraft: WeightLine<MainDoughItem>[] = [
        {
            name: FormulaIngredient.STRONG_WHITE_FLOUR,
            weightInGrams: weightOf(FormulaIngredient.STRONG_WHITE_FLOUR) - discardFlour - prefermentFlour,
        },
        { name: FormulaIngredient.FLOUR_2, weightInGrams: weightOf(FormulaIngredient.FLOUR_2) },
        { name: FormulaIngredient.FLOUR_3, weightInGrams: weightOf(FormulaIngredient.FLOUR_3) },
        {
            name: FormulaIngredient.WATER,
            weightInGrams: weightOf(FormulaIngredient.WATER) - discardWater - prefermentWater,
        },
        { name: FormulaIngredient.SALT, weightInGrams: weightOf(FormulaIngredient.SALT) },
        { name: FermentName.SOURDOUGH_DISCARD, weightInGrams: sourdoughDiscardTotalWeight },
        { name: FermentName.PRE_FERMENT, weightInGrams: prefermentTotalWeight },
        { name: FormulaIngredient.YEAST, weightInGrams: weightOf(FormulaIngredient.YEAST) - prefermentYeast },
        {
            name: FormulaIngredient.BARLEY_MALT_EXTRACT,
            weightInGrams: weightOf(FormulaIngredient.BARLEY_MALT_EXTRACT),
        },
        { name: FormulaIngredient.INCLUSION_2, weightInGrams: weightOf(FormulaIngredient.INCLUSION_2) },
        { name: FormulaIngredient.INCLUSION_3, weightInGrams: weightOf(FormulaIngredient.INCLUSION_3) },
    ];

    return {
        totalIngredients,
        mainDough: mainDoughDraft.filter((line) => line.weightInGrams > MAIN_DOUGH_EPSILON_GRAMS),
        ferments: [
            {
                name: FermentName.SOURDOUGH_DISCARD,
                components: [
                    { name: FermentComponent.FLOUR, weightInGrams: discardFlour },
                    { name: FermentComponent.WATER, weightInGrams: discardWater },
                ],
            },
            {
                name: FermentName.PRE_FERMENT,
                components: [
                    { name: FermentComponent.FLOUR, weightInGrams: prefermentFlour },
                    { name: FermentComponent.WATER, weightInGrams: prefermentWater },
                    { name: FermentComponent.YEAST, weightInGrams: prefermentYeast },
                ],
            },
        ],
        preFermentedFlour,
        sourdoughDiscardTotalWeight,
        prefermentTotalWeight,
    };
}
