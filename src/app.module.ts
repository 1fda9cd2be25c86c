import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { APP_FILTER, APP_INTERCEPTOR } from '@nestjs/core';
import { ClsModule } from 'nestjs-cls';
import type { Request } from 'express';
import { join } from 'path';
import { ClsContextInterceptor } from './common/interceptors/cls-context.interceptor';
import { AllExceptionsFilter } from './common/filters/all-exceptions.filter';
import { AppContextModule } from './common/context/app-context.module';
import { MedicineModule } from './medicine/medicine.module';
import { CartModule } from './cart/cart.module';
import { SalesModule } from './sales/sales.module';

function headerValue(raw: string | string[] | undefined): string | undefined {
  return Array.isArray(raw) ? raw[0] : raw;
}

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
    }),

    TypeOrmModule.forRootAsync({
      imports: [ConfigModule],
      inject: [ConfigService],
      useFactory: (config: ConfigService) => ({
        type: 'postgres',
        host: config.get<string>('DB_HOST'),
        port: Number(config.get<string>('DB_PORT') ?? 5432),
        username: config.get<string>('DB_USER'),
        password: config.get<string>('DB_PASS'),
        database: config.get<string>('DB_NAME'),
        autoLoadEntities: true,
        synchronize: false,
        migrations: [join(__dirname, 'migrations/*.js')],
        migrationsTableName: 'typeorm_migrations',
      }),
    }),

    // request-scoped context for every HTTP route
    ClsModule.forRoot({
      global: true,
      middleware: {
        mount: true,
        setup: (cls, req: Request) => {
          const ip =
            headerValue(req.headers['x-forwarded-for'])?.split(',')[0]?.trim() ||
            req.socket.remoteAddress ||
            undefined;

          cls.set('ip', ip);
          cls.set('userAgent', headerValue(req.headers['user-agent']));

          const headerCorrelationId =
            headerValue(req.headers['x-correlation-id']) ||
            headerValue(req.headers['x-request-id']);

          cls.set('correlationId', headerCorrelationId || cls.getId());
        },
      },
    }),
    AppContextModule,
    MedicineModule,
    CartModule,
    SalesModule,
  ],
  providers: [
    {
      provide: APP_INTERCEPTOR,
      useClass: ClsContextInterceptor,
    },
    {
      provide: APP_FILTER,
      useClass: AllExceptionsFilter,
    },
  ],
})
export class AppModule {}
