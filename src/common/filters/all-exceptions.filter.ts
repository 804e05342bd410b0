import { ArgumentsHost, Catch, ExceptionFilter, HttpException, HttpStatus, Logger } from '@nestjs/common';
import { HttpAdapterHost } from '@nestjs/core';

export interface ErrorResponseBody {
    statusCode: number;
    timestamp: string;
    path: string;
    method: string;
    message: string | string[];
}

// ValidationPipe 的错误响应形如 { message: string[] }，其余 HttpException 多为字符串
export function extractErrorMessage(exception: unknown): string | string[] {
    if (!(exception instanceof HttpException)) {
        return '服务器内部错误';
    }
    const response = exception.getResponse();
    if (typeof response === 'string') {
        return response;
    }
    if ('message' in response) {
        const { message } = response;
        if (typeof message === 'string') {
            return message;
        }
        if (Array.isArray(message)) {
            return message.map((item) => String(item));
        }
    }
    return exception.message;
}

@Catch()
export class AllExceptionsFilter implements ExceptionFilter {
    private readonly logger = new Logger(AllExceptionsFilter.name);

    constructor(private readonly httpAdapterHost: HttpAdapterHost) {}

    catch(exception: unknown, host: ArgumentsHost): void {
        const { httpAdapter } = this.httpAdapterHost;
        const ctx = host.switchToHttp();

        const httpStatus =
            exception instanceof HttpException ? exception.getStatus() : HttpStatus.INTERNAL_SERVER_ERROR;

        const path: string = httpAdapter.getRequestUrl(ctx.getRequest());
        const method: string = httpAdapter.getRequestMethod(ctx.getRequest());
        const responseBody: ErrorResponseBody = {
            statusCode: httpStatus,
            timestamp: new Date().toISOString(),
            path,
            method,
            message: extractErrorMessage(exception),
        };

        const summary = `${method} ${path} -> ${httpStatus}: ${JSON.stringify(responseBody.message)}`;
        if (httpStatus >= 500) {
            this.logger.error(summary, exception instanceof Error ? exception.stack : undefined);
        } else {
            this.logger.warn(summary);
        }

        httpAdapter.reply(ctx.getResponse(), responseBody, httpStatus);
    }
}
