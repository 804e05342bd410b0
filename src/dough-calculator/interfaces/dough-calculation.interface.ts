/**
 * 文件路径: src/dough-calculator/interfaces/dough-calculation.interface.ts
 * 文件描述: 面团计算器的输入与输出类型。
 */

// 总配方中的 9 种原料，顺序即输出顺序
export enum FormulaIngredient {
    STRONG_WHITE_FLOUR = 'Strong white flour',
    FLOUR_2 = 'Flour 2',
    FLOUR_3 = 'Flour 3',
    WATER = 'Water',
    SALT = 'Salt',
    YEAST = 'Yeast',
    BARLEY_MALT_EXTRACT = 'Barley Malt Extract',
    INCLUSION_2 = 'Inclusion 2',
    INCLUSION_3 = 'Inclusion 3',
}

export enum FermentName {
    SOURDOUGH_DISCARD = 'Sourdough discard',
    PRE_FERMENT = 'Pre-ferment',
}

export enum FermentComponent {
    FLOUR = 'Flour',
    WATER = 'Water',
    YEAST = 'Yeast',
}

// 主面团中除了原料本身，还有两种发酵物作为整体加入
export type MainDoughItem = FormulaIngredient | FermentName;

export interface DoughCalculationInput {
    doughWeight: number;
    sourdoughDiscardPercent: number;
    prefermentPercent: number;
    scale: number;
    flour2Percent: number;
    flour3Percent: number;
    waterPercent: number;
    saltPercent: number;
    yeastPercent: number;
    barleyMaltPercent: number;
    inclusion2Percent: number;
    inclusion3Percent: number;
    // 发酵物内部组成比例，总和不要求为 100
    discardFlourRatio: number;
    discardWaterRatio: number;
    prefermentFlourRatio: number;
    prefermentWaterRatio: number;
    prefermentYeastRatio: number;
}

// 计算结果会被缓存并在调用方之间共享，所有字段只读
export interface FormulaLine {
    readonly name: FormulaIngredient;
    readonly bakersPercent: number;
    readonly weightInGrams: number;
}

export interface WeightLine<N extends string = string> {
    readonly name: N;
    readonly weightInGrams: number;
}

export interface FermentBreakdown {
    readonly name: FermentName;
    readonly components: readonly WeightLine<FermentComponent>[];
}

export interface DoughCalculationResult {
    readonly totalIngredients: readonly FormulaLine[];
    readonly mainDough: readonly WeightLine<MainDoughItem>[];
    readonly ferments: readonly FermentBreakdown[];
    readonly preFermentedFlour: number;
    readonly sourdoughDiscardTotalWeight: number;
    readonly prefermentTotalWeight: number;
}
