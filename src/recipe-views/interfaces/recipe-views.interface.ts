/**
 * 文件路径: src/recipe-views/interfaces/recipe-views.interface.ts
 * 文件描述: 展示层的三个视图（简易配方、配方详情、技术视图）及帮助内容的结构。
 */
import {
    DoughCalculationInput,
    FermentComponent,
    FermentName,
    FormulaLine,
    MainDoughItem,
    WeightLine,
} from '../../dough-calculator/interfaces/dough-calculation.interface';

// 表单输入：基础项始终生效，进阶项只在 advanced 为 true 时生效
export type RecipeForm = Partial<DoughCalculationInput> & { advanced?: boolean };

// 视图会被缓存并在请求之间共享，所有字段只读
export interface MetricCard {
    readonly key: 'hydration' | 'salt' | 'discard' | 'preferment';
    readonly label: string;
    readonly percent: number;
    readonly help: string;
}

export interface ShoppingListItem {
    readonly label: string;
    readonly weightInGrams: number;
}

export interface FermentTable {
    readonly name: FermentName;
    readonly note: string;
    readonly caption: string;
    readonly rows: readonly WeightLine<FermentComponent>[];
    readonly totalWeight: number;
}

export interface SimpleRecipeView {
    readonly totalDoughWeight: number;
    readonly metrics: readonly MetricCard[];
    readonly prefermentTotalWeight: number;
    readonly shoppingList: readonly ShoppingListItem[];
}

export interface RecipeDetailsView {
    readonly finalDough: readonly WeightLine<MainDoughItem>[];
    readonly totalDoughWeight: number;
    readonly ferments: readonly FermentTable[];
}

export interface MasterFormula {
    readonly rows: readonly FormulaLine[];
    readonly totalBakersPercent: number;
    readonly totalWeight: number;
}

export interface FlourShare {
    readonly label: string;
    readonly percent: number;
}

export interface TechnicalView {
    readonly masterFormula: MasterFormula;
    readonly fermentAnalysis: readonly FermentTable[];
    readonly keyMetrics: {
        readonly preFermentedFlour: number;
        readonly scale: number;
        readonly totalFlourWeight: number;
        readonly effectiveHydrationPercent: number;
    };
    readonly flourComposition: readonly FlourShare[];
}

export interface RecipeViews {
    readonly advanced: boolean;
    readonly input: Readonly<DoughCalculationInput>;
    readonly recipe: SimpleRecipeView;
    readonly details: RecipeDetailsView;
    readonly technical: TechnicalView;
}

export interface GuideSection {
    title: string;
    items: string[];
}

export interface BakingGuides {
    schedule: GuideSection;
    timeline: GuideSection;
    temperature: GuideSection;
    proTips: GuideSection;
    troubleshooting: GuideSection;
    formulaAdjustments: GuideSection;
    safetyLimits: GuideSection;
    bakersPercentages: GuideSection;
}
