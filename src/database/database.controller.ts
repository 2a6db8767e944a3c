import { Controller, Get } from '@nestjs/common';
import { DatabaseService } from './database.service';

@Controller('database')
export class DatabaseController {
    constructor(private readonly databaseService: DatabaseService) {}

    @Get('health')
    async getHealth() {
        const isHealthy = await this.databaseService.healthCheck();
        return {
            status: isHealthy ? 'healthy' : 'unhealthy',
            timestamp: new Date().toISOString(),
            message: isHealthy
                ? '데이터베이스 연결이 정상입니다.'
                : '데이터베이스 연결에 문제가 있습니다.',
        };
    }
}
