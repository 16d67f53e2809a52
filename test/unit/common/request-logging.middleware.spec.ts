import { Logger } from '@nestjs/common';
import { Request, Response } from 'express';
import { RequestLoggingMiddleware } from '@common/middleware/request-logging.middleware';
import { AppConfig } from '@common/config/app.config';

describe('RequestLoggingMiddleware', () => {
  const baseConfig: AppConfig = {
    port: 3000,
    sessionSecret: 'test-secret',
    catalogBaseUrl: 'http://catalog.test/images/',
    swaggerEnabled: false,
    requestLoggingEnabled: true,
  };

  let logSpy: jest.SpyInstance;
  let finishHandlers: Array<() => void>;
  let response: { statusCode: number; once: jest.Mock };

  const buildRequest = (route?: { path: string }): Request => {
    const request = {
      method: 'GET',
      baseUrl: '',
      originalUrl: '/api/orders/999',
      route,
    };
    return request as unknown as Request;
  };

  beforeEach(() => {
    logSpy = jest.spyOn(Logger.prototype, 'log').mockImplementation();
    finishHandlers = [];
    response = {
      statusCode: 200,
      once: jest.fn((event: string, handler: () => void) => {
        if (event === 'finish') {
          finishHandlers.push(handler);
        }
      }),
    };
  });

  afterEach(() => {
    logSpy.mockRestore();
  });

  it('given: 로깅이 켜져 있음 / when: 응답 전송이 끝남 / then: 최종 상태 코드로 한 줄을 남김', () => {
    // given
    const middleware = new RequestLoggingMiddleware(baseConfig);
    const next = jest.fn();

    // when
    middleware.use(
      buildRequest({ path: '/api/orders/:orderId' }),
      response as unknown as Response,
      next,
    );
    response.statusCode = 400;
    finishHandlers.forEach((handler) => handler());

    // then
    expect(next).toHaveBeenCalledTimes(1);
    expect(logSpy).toHaveBeenCalledTimes(1);
    expect(logSpy.mock.calls[0][0]).toMatch(
      /^GET \/api\/orders\/:orderId 400 \d+\.\dms$/,
    );
  });

  it('given: 응답이 아직 끝나지 않음 / when: 미들웨어를 통과함 / then: 로그를 남기지 않음', () => {
    // given
    const middleware = new RequestLoggingMiddleware(baseConfig);

    // when
    middleware.use(buildRequest(), response as unknown as Response, jest.fn());

    // then
    expect(logSpy).not.toHaveBeenCalled();
  });

  it('given: 매칭된 라우트가 없음 / when: 응답 전송이 끝남 / then: 실제 URL로 기록함', () => {
    // given
    const middleware = new RequestLoggingMiddleware(baseConfig);

    // when
    middleware.use(buildRequest(), response as unknown as Response, jest.fn());
    response.statusCode = 404;
    finishHandlers.forEach((handler) => handler());

    // then
    expect(logSpy.mock.calls[0][0]).toMatch(
      /^GET \/api\/orders\/999 404 \d+\.\dms$/,
    );
  });

  it('given: 로깅이 꺼져 있음 / when: 미들웨어를 통과함 / then: finish를 구독하지 않고 다음으로 넘김', () => {
    // given
    const middleware = new RequestLoggingMiddleware({
      ...baseConfig,
      requestLoggingEnabled: false,
    });
    const next = jest.fn();

    // when
    middleware.use(buildRequest(), response as unknown as Response, next);

    // then
    expect(next).toHaveBeenCalledTimes(1);
    expect(response.once).not.toHaveBeenCalled();
    expect(logSpy).not.toHaveBeenCalled();
  });
});
