import { DEFAULT_DOUGH_INPUT } from './dough-calculator.constants';
import { apportion, calculateDough, sumFlourWeight } from './dough-calculator.math';
import {
    DoughCalculationInput,
    DoughCalculationResult,
    FermentComponent,
    FermentName,
    FormulaIngredient,
} from './interfaces/dough-calculation.interface';

const sumWeights = (lines: readonly { weightInGrams: number }[]) =>
    lines.reduce((sum, line) => sum + line.weightInGrams, 0);

const fermentOf = (result: DoughCalculationResult, name: FermentName) => {
    const ferment = result.ferments.find((item) => item.name === name);
    if (!ferment) {
        throw new Error(`missing ferment ${name}`);
    }
    return ferment;
};

const componentOf = (result: DoughCalculationResult, name: FermentName, component: FermentComponent) =>
    fermentOf(result, name).components.find((item) => item.name === component)?.weightInGrams;

const mainDoughOf = (result: DoughCalculationResult, name: string) =>
    result.mainDough.find((line) => line.name === name)?.weightInGrams;

describe('apportion', () => {
    it('splits a total in proportion to the ratios', () => {
        expect(apportion(300, [100, 200])).toEqual([100, 200]);
    });

    it('returns zeros when the ratio sum is zero or negative', () => {
        expect(apportion(300, [0, 0])).toEqual([0, 0]);
        expect(apportion(300, [-5, 2, 1])).toEqual([0, 0, 0]);
    });
});

describe('calculateDough', () => {
    const input: DoughCalculationInput = { ...DEFAULT_DOUGH_INPUT };

    describe('900 g sandwich loaf', () => {
        const result = calculateDough(input);

        it('lists all nine formula ingredients with their percentages', () => {
            expect(result.totalIngredients.map((line) => [line.name, line.bakersPercent])).toEqual([
                [FormulaIngredient.STRONG_WHITE_FLOUR, 85],
                [FormulaIngredient.FLOUR_2, 15],
                [FormulaIngredient.FLOUR_3, 0],
                [FormulaIngredient.WATER, 72],
                [FormulaIngredient.SALT, 2],
                [FormulaIngredient.YEAST, 0.5],
                [FormulaIngredient.BARLEY_MALT_EXTRACT, 3],
                [FormulaIngredient.INCLUSION_2, 0],
                [FormulaIngredient.INCLUSION_3, 0],
            ]);
        });

        it('apportions the dough weight over the percentage sum', () => {
            // 900 / 177.5 * pct
            const strongWhite = result.totalIngredients[0];
            expect(strongWhite.weightInGrams).toBeCloseTo(430.985915, 5);
            expect(result.totalIngredients[3].weightInGrams).toBeCloseTo(365.070423, 5);
            expect(sumWeights(result.totalIngredients)).toBeCloseTo(900, 9);
        });

        it('derives ferment totals from total flour weight', () => {
            expect(sumFlourWeight(result.totalIngredients)).toBeCloseTo(507.042254, 5);
            expect(result.sourdoughDiscardTotalWeight).toBeCloseTo(152.112676, 5);
            expect(result.prefermentTotalWeight).toBeCloseTo(152.112676, 5);
        });

        it('splits each ferment by its own composition', () => {
            expect(componentOf(result, FermentName.SOURDOUGH_DISCARD, FermentComponent.FLOUR)).toBeCloseTo(76.056338, 5);
            expect(componentOf(result, FermentName.SOURDOUGH_DISCARD, FermentComponent.WATER)).toBeCloseTo(76.056338, 5);
            expect(componentOf(result, FermentName.PRE_FERMENT, FermentComponent.FLOUR)).toBeCloseTo(75.677948, 5);
            expect(componentOf(result, FermentName.PRE_FERMENT, FermentComponent.YEAST)).toBeCloseTo(0.756779, 5);
        });

        it('closes each ferment on its total weight', () => {
            expect(sumWeights(fermentOf(result, FermentName.SOURDOUGH_DISCARD).components)).toBeCloseTo(
                result.sourdoughDiscardTotalWeight,
                9,
            );
            expect(sumWeights(fermentOf(result, FermentName.PRE_FERMENT).components)).toBeCloseTo(
                result.prefermentTotalWeight,
                9,
            );
        });

        it('reports pre-fermented flour as the sum of ferment flour', () => {
            const discardFlour = componentOf(result, FermentName.SOURDOUGH_DISCARD, FermentComponent.FLOUR) ?? NaN;
            const prefermentFlour = componentOf(result, FermentName.PRE_FERMENT, FermentComponent.FLOUR) ?? NaN;
            expect(result.preFermentedFlour).toBe(discardFlour + prefermentFlour);
            expect(result.preFermentedFlour).toBeLessThanOrEqual(sumFlourWeight(result.totalIngredients));
        });

        it('builds the main dough in mixing order and drops zero lines', () => {
            expect(result.mainDough.map((line) => line.name)).toEqual([
                FormulaIngredient.STRONG_WHITE_FLOUR,
                FormulaIngredient.FLOUR_2,
                FormulaIngredient.WATER,
                FormulaIngredient.SALT,
                FermentName.SOURDOUGH_DISCARD,
                FermentName.PRE_FERMENT,
                FormulaIngredient.YEAST,
                FormulaIngredient.BARLEY_MALT_EXTRACT,
            ]);
            expect(mainDoughOf(result, FormulaIngredient.STRONG_WHITE_FLOUR)).toBeCloseTo(279.251629, 5);
            expect(mainDoughOf(result, FormulaIngredient.WATER)).toBeCloseTo(213.336136, 5);
            expect(mainDoughOf(result, FormulaIngredient.YEAST)).toBeCloseTo(1.778432, 5);
            // 替代面粉不参与发酵物扣减
            expect(mainDoughOf(result, FormulaIngredient.FLOUR_2)).toBe(result.totalIngredients[1].weightInGrams);
        });

        it('conserves the dough weight in the main dough', () => {
            expect(sumWeights(result.mainDough)).toBeCloseTo(900, 6);
        });
    });

    it.each([
        { doughWeight: 500, scale: 1, waterPercent: 65 },
        { doughWeight: 1200, scale: 2.5, flour2Percent: 30, flour3Percent: 10, inclusion2Percent: 8 },
        { doughWeight: 750, scale: 0.5, sourdoughDiscardPercent: 0, prefermentPercent: 50, yeastPercent: 1 },
        { doughWeight: 900, scale: 1, discardFlourRatio: 100, discardWaterRatio: 60, prefermentYeastRatio: 0 },
    ])('conserves doughWeight * scale for %o', (overrides) => {
        const result = calculateDough({ ...input, ...overrides });
        const expected = overrides.doughWeight * overrides.scale;
        expect(Math.abs(sumWeights(result.mainDough) - expected) / expected).toBeLessThan(1e-6);
    });

    it('scales every weight linearly with the scale factor', () => {
        const single = calculateDough(input);
        const double = calculateDough({ ...input, scale: 2 });

        single.totalIngredients.forEach((line, index) => {
            expect(double.totalIngredients[index].weightInGrams).toBeCloseTo(line.weightInGrams * 2, 9);
            expect(double.totalIngredients[index].bakersPercent).toBe(line.bakersPercent);
        });
        single.mainDough.forEach((line, index) => {
            expect(double.mainDough[index].name).toBe(line.name);
            expect(double.mainDough[index].weightInGrams).toBeCloseTo(line.weightInGrams * 2, 9);
        });
        expect(double.preFermentedFlour).toBeCloseTo(single.preFermentedFlour * 2, 9);
        expect(double.sourdoughDiscardTotalWeight).toBeCloseTo(single.sourdoughDiscardTotalWeight * 2, 9);
        expect(double.prefermentTotalWeight).toBeCloseTo(single.prefermentTotalWeight * 2, 9);
    });

    it('returns an empty result when the percentages sum to zero', () => {
        const result = calculateDough({
            ...input,
            sourdoughDiscardPercent: 0,
            prefermentPercent: 0,
            flour2Percent: 0,
            flour3Percent: 0,
            waterPercent: -100,
            saltPercent: 0,
            yeastPercent: 0,
            barleyMaltPercent: 0,
        });

        expect(result).toEqual({
            totalIngredients: [],
            mainDough: [],
            ferments: [],
            preFermentedFlour: 0,
            sourdoughDiscardTotalWeight: 0,
            prefermentTotalWeight: 0,
        });
    });

    it('guards each ferment independently', () => {
        const result = calculateDough({ ...input, discardFlourRatio: 0, discardWaterRatio: 0 });

        expect(fermentOf(result, FermentName.SOURDOUGH_DISCARD).components.map((c) => c.weightInGrams)).toEqual([0, 0]);
        expect(sumWeights(fermentOf(result, FermentName.PRE_FERMENT).components)).toBeCloseTo(
            result.prefermentTotalWeight,
            9,
        );
        expect(result.preFermentedFlour).toBe(componentOf(result, FermentName.PRE_FERMENT, FermentComponent.FLOUR));
        // 弃种总重仍按面粉计算，只是组分为 0
        expect(result.sourdoughDiscardTotalWeight).toBeCloseTo(152.112676, 5);
    });

    it('zeroes the pre-ferment when its composition sums below zero', () => {
        const result = calculateDough({
            ...input,
            prefermentFlourRatio: -10,
            prefermentWaterRatio: 5,
            prefermentYeastRatio: 1,
        });

        expect(fermentOf(result, FermentName.PRE_FERMENT).components.map((c) => c.weightInGrams)).toEqual([0, 0, 0]);
        expect(componentOf(result, FermentName.SOURDOUGH_DISCARD, FermentComponent.FLOUR)).toBeCloseTo(76.056338, 5);
    });

    it('propagates alternative flours above 100% as a negative strong white share', () => {
        const result = calculateDough({ ...input, flour2Percent: 80, flour3Percent: 40 });

        expect(result.totalIngredients[0].bakersPercent).toBe(-20);
        expect(result.totalIngredients[0].weightInGrams).toBeLessThan(0);
        expect(mainDoughOf(result, FormulaIngredient.STRONG_WHITE_FLOUR)).toBeUndefined();
    });

    it('is deterministic for identical inputs', () => {
        expect(calculateDough({ ...input })).toEqual(calculateDough({ ...input }));
    });
});
