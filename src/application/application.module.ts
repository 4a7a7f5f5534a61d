import { Module } from '@nestjs/common';
import { InfrastructureModule } from '../infrastructure/infrastructure.module';

// Use Cases
import { SubmitTaskUseCase, PollTaskUseCase, RunTaskUseCase } from './use-cases';

/**
 * Application Module
 * Contains all use cases
 *
 * Use cases depend on output ports (interfaces) only; the InfrastructureModule
 * binds the port tokens to adapters.
 */
@Module({
  imports: [InfrastructureModule],
  providers: [SubmitTaskUseCase, PollTaskUseCase, RunTaskUseCase],
  exports: [SubmitTaskUseCase, PollTaskUseCase, RunTaskUseCase],
})
export class ApplicationModule {}
