import { Module } from '@nestjs/common';
import { FrameworkRegistry } from './framework.registry';

@Module({
    providers: [FrameworkRegistry],
    exports: [FrameworkRegistry],
})
export class FrameworkModule {}
