/**
 * 文件路径: src/common/cache/memo-cache.ts
 * 文件描述: 以输入元组为键的有界 LRU 记忆化缓存。计算函数必须是纯函数，缓存命中与未命中的结果完全一致。
 */
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

export type MemoKeyPart = number | string | boolean | null | undefined;

// 0 与 -0、NaN 需要各自独立的键，JSON.stringify 会把它们混为一谈
function encodeKeyPart(part: MemoKeyPart): string {
    if (typeof part === 'number') {
        return Object.is(part, -0) ? 'n:-0' : `n:${String(part)}`;
    }
    if (typeof part === 'string') {
        return `s:${JSON.stringify(part)}`;
    }
    return `p:${String(part)}`;
}

// 缓存的值在调用方之间共享，返回前整体冻结
export function deepFreeze<T>(value: T): T {
    if (typeof value !== 'object' || value === null) {
        return value;
    }
    for (const nested of Object.values(value)) {
        deepFreeze(nested);
    }
    Object.freeze(value);
    return value;
}

export class MemoCache<V> {
    private readonly logger: Logger;
    private readonly entries = new Map<string, { value: V }>();

    constructor(
        private readonly capacity: number,
        name: string,
    ) {
        if (!Number.isInteger(capacity) || capacity < 0) {
            throw new Error(`缓存容量必须是非负整数，收到: ${capacity}`);
        }
        this.logger = new Logger(`MemoCache:${name}`);
        this.logger.log(capacity > 0 ? `已启用，容量 ${capacity}` : '已禁用 (容量为 0)');
    }

    get size(): number {
        return this.entries.size;
    }

    get enabled(): boolean {
        return this.capacity > 0;
    }

    getOrCompute(keyParts: readonly MemoKeyPart[], compute: () => V): V {
        if (!this.enabled) {
            return deepFreeze(compute());
        }

        const key = keyParts.map(encodeKeyPart).join('|');
        const hit = this.entries.get(key);
        if (hit) {
            // 命中后移到末尾，保持 LRU 顺序
            this.entries.delete(key);
            this.entries.set(key, hit);
            this.logger.debug(`命中 (${this.entries.size}/${this.capacity})`);
            return hit.value;
        }

        const value = deepFreeze(compute());
        this.entries.set(key, { value });
        if (this.entries.size > this.capacity) {
            const oldest = this.entries.keys().next();
            if (!oldest.done) {
                this.entries.delete(oldest.value);
            }
        }
        this.logger.debug(`未命中 (${this.entries.size}/${this.capacity})`);
        return value;
    }

    clear(): void {
        this.entries.clear();
    }
}

/**
 * 从环境变量读取缓存容量，未配置时使用默认值；非法值在启动时直接报错。
 */
export function readCacheCapacity(configService: ConfigService, key: string, fallback: number): number {
    const raw = configService.get<string | number>(key);
    if (raw === undefined || String(raw).trim() === '') {
        return fallback;
    }
    const capacity = Number(raw);
    if (!Number.isInteger(capacity) || capacity < 0) {
        throw new Error(`${key} 必须是非负整数，收到: "${raw}"`);
    }
    return capacity;
}
