/**
 * 文件路径: src/app.service.ts
 * 文件描述: 应用的根服务。
 */
import { Injectable } from '@nestjs/common';

@Injectable()
export class AppService {
    getHello(): string {
        return '欢迎使用鲁邦种弃种配方计算服务! (Waste Not Want Not - Sourdough Recipe Calculator)';
    }
}
