import { MiddlewareConsumer, Module, NestModule } from '@nestjs/common';

// GLOBAL MODULES
import { GlobalConfigModule } from './@common/config/config.module';
import { RequestLoggingMiddleware } from './@common/middleware/request-logging.middleware';

// APP MODULES
import { OrderModule } from './order/order.module';

@Module({
  imports: [
    // GLOBAL
    GlobalConfigModule,

    // APP MODULES
    OrderModule,
  ],
  controllers: [],
  providers: [],
})
export class AppModule implements NestModule {
  configure(consumer: MiddlewareConsumer): void {
    consumer.apply(RequestLoggingMiddleware).forRoutes('*');
  }
}
