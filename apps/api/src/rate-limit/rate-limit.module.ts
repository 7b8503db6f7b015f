import { Module } from '@nestjs/common';
import { RateLimitRepository } from './rate-limit.repository';
import { RateLimiterService } from './rate-limiter.service';

@Module({
  providers: [RateLimitRepository, RateLimiterService],
  exports: [RateLimiterService],
})
export class RateLimitModule {}
