import { Module } from '@nestjs/common';
import { UsosClient } from './usos.client';

@Module({
  providers: [UsosClient],
  exports: [UsosClient],
})
export class UsosModule {}
