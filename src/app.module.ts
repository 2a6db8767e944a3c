// 여기에 임포트해야 nestJS가 인식함
import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import envConfig from './config/env.config';
import { validate } from './config/env.validation';
import { AppConfigModule } from './config/config.module';
import { DatabaseModule } from './database/database.module';
// 구조화 답변 연습
import { FrameworkModule } from './modules/framework/framework.module';
import { PracticeModule } from './modules/practice/practice.module';
import { AnalysisModule } from './modules/analysis/analysis.module';
import { ReportModule } from './modules/report/report.module';

@Module({
    imports: [
        ConfigModule.forRoot({
            isGlobal: true,
            envFilePath: [`.env.${process.env.NODE_ENV || 'development'}`, '.env'],
            load: [envConfig],
            validate,
        }),
        AppConfigModule,
        DatabaseModule,
        FrameworkModule,
        PracticeModule,
        AnalysisModule,
        ReportModule,
    ],
})
export class AppModule {}
