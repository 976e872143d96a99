import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { logger } from '../logger';

/**
 * 结构化应用错误类
 * 用于区分可预期的业务错误和系统错误，避免泄露内部实现细节
 */
export class AppError extends Error {
  statusCode: number;
  code: string;
  isOperational: boolean;

  constructor(
    message: string,
    statusCode: number = 400,
    code: string = 'BAD_REQUEST',
    isOperational: boolean = true,
  ) {
    super(message);
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;
    Object.setPrototypeOf(this, AppError.prototype);
  }

  static notFound(message: string = 'Resource not found'): AppError {
    return new AppError(message, 404, 'NOT_FOUND');
  }

  static badRequest(message: string = 'Invalid request parameters'): AppError {
    return new AppError(message, 400, 'BAD_REQUEST');
  }

  static serviceUnavailable(message: string = 'Service unavailable'): AppError {
    return new AppError(message, 503, 'SERVICE_UNAVAILABLE');
  }
}

/**
 * 未匹配路由处理
 */
export function notFoundHandler(req: Request, _res: Response, next: NextFunction) {
  next(AppError.notFound(`Route ${req.method} ${req.path} not found`));
}

export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  next: NextFunction,
) {
  // 优先使用 req.log（pino-http 注入的带上下文日志器）
  const log = req.log ?? logger;
  const logContext = {
    err,
    method: req.method,
    path: req.path,
  };

  // Zod 验证错误 - 业务级别警告
  if (err instanceof ZodError) {
    const first = err.errors[0];
    log.warn(logContext, `Validation error: ${first?.message}`);
    return res.status(400).json({
      success: false,
      error: first ? `${first.path.join('.')}: ${first.message}` : 'Invalid request parameters',
      code: 'VALIDATION_ERROR',
    });
  }

  // 结构化应用错误 - 根据 isOperational 区分日志级别
  if (err instanceof AppError) {
    if (err.isOperational) {
      log.warn(logContext, `Request failed: ${err.message}`);
    } else {
      log.error(logContext, `System error: ${err.message}`);
    }
    return res.status(err.statusCode).json({
      success: false,
      error: err.isOperational ? err.message : 'Internal server error',
      code: err.code,
    });
  }

  // 未知错误 - 统一返回 500，仅记录完整错误信息到日志
  log.error(logContext, `Unhandled error: ${err.message}`);
  return res.status(500).json({
    success: false,
    error: 'Internal server error',
    code: 'INTERNAL_ERROR',
  });
}
