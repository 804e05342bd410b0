/**
 * 文件路径: src/dough-calculator/dough-calculator.service.ts
 * 文件描述: 面团计算服务。对纯计算函数做可选的记忆化，缓存是否存在不影响结果。
 */
import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { MemoCache, readCacheCapacity } from '../common/cache/memo-cache';
import { DEFAULT_DOUGH_INPUT, DOUGH_INPUT_KEYS } from './dough-calculator.constants';
import { calculateDough } from './dough-calculator.math';
import { DoughCalculationInput, DoughCalculationResult } from './interfaces/dough-calculation.interface';

export const DOUGH_CALC_CACHE_SIZE = 'DOUGH_CALC_CACHE_SIZE';

@Injectable()
export class DoughCalculatorService {
    private readonly cache: MemoCache<DoughCalculationResult>;

    constructor(configService: ConfigService) {
        this.cache = new MemoCache(
            readCacheCapacity(configService, DOUGH_CALC_CACHE_SIZE, 256),
            DoughCalculatorService.name,
        );
    }

    calculate(input: DoughCalculationInput): DoughCalculationResult {
        const keyParts = DOUGH_INPUT_KEYS.map((key) => input[key]);
        return this.cache.getOrCompute(keyParts, () => calculateDough(input));
    }

    getDefaults(): DoughCalculationInput {
        return { ...DEFAULT_DOUGH_INPUT };
    }
}
