import { DynamicModule, Module } from '@nestjs/common';
import { MESSAGING_OPTIONS, MessagingOptions, MessagingService } from './messaging.service';

@Module({})
export class MessagingModule {
  static register(options: MessagingOptions): DynamicModule {
    return {
      module: MessagingModule,
      global: true,
      providers: [{ provide: MESSAGING_OPTIONS, useValue: options }, MessagingService],
      exports: [MessagingService],
    };
  }
}
