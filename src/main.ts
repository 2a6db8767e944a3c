// src/main.ts
import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import express from 'express';
import { AppModule } from './app.module';
import { AppConfigService } from './config/config.service';

async function bootstrap() {
    const app = await NestFactory.create(AppModule);

    // ConfigService 가져오기
    const configService = app.get(AppConfigService);

    app.use(express.json({ limit: '10mb' }));
    app.use(express.urlencoded({ limit: '10mb', extended: true }));

    app.enableCors({
        origin: configService.corsOrigins,
        methods: ['GET', 'POST'],
        credentials: true,
    });

    // 모든 요청 경로에 /api prefix 추가
    app.setGlobalPrefix('api');

    await app.listen(configService.port);
    Logger.log(`🚀 서버 시작: http://localhost:${configService.port}/api`, 'Bootstrap');
}

bootstrap().catch((error: unknown) => {
    Logger.error(`❌ 서버 시작 실패: ${error instanceof Error ? error.message : String(error)}`, 'Bootstrap');
    process.exit(1);
});
