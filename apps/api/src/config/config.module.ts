import { Global, Module } from '@nestjs/common';
import { ORDERING_CONFIG, loadOrderingConfig } from './ordering.config';

@Global()
@Module({
  providers: [
    {
      provide: ORDERING_CONFIG,
      // ConfigModule has already merged the .env files into process.env
      useFactory: () => loadOrderingConfig(process.env),
    },
  ],
  exports: [ORDERING_CONFIG],
})
export class OrderingConfigModule {}
