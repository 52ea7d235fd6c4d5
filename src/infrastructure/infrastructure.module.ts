import { Module } from '@nestjs/common';
import { DatabaseModule } from '@/infrastructure/database/database.module';
import { HttpModule } from '@/infrastructure/http/http.module';

/**
 * Groups the adapters: Postgres persistence, the payment gateway and the HTTP surface
 */
@Module({
  imports: [DatabaseModule, HttpModule],
})
export class InfrastructureModule {}
