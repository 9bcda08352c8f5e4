import { DynamicModule, Global, Module } from '@nestjs/common';
import { CONFIG_SOURCE, ConfigSource, ReplayConfigService } from './replay-config.service';

@Global()
@Module({
  providers: [ReplayConfigService],
  exports: [ReplayConfigService],
})
export class ReplayConfigModule {
  /** Points the config service at a specific file/environment (CLI --config, tests). */
  static forRoot(source: ConfigSource = {}): DynamicModule {
    return {
      module: ReplayConfigModule,
      providers: [{ provide: CONFIG_SOURCE, useValue: source }, ReplayConfigService],
      exports: [ReplayConfigService],
    };
  }
}
