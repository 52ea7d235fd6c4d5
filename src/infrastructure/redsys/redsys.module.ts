import { Module } from '@nestjs/common';
import { AppConfigService } from '@/config/app.config';
import { RedsysService } from './redsys.service';

@Module({
  providers: [RedsysService, AppConfigService],
  exports: [RedsysService],
})
export class RedsysModule {}
