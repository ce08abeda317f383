import { Module, Global } from "@nestjs/common";
import { RetryService } from "./retry.service";

/**
 * Global module that provides the retry mechanism to every feature module
 */
@Global()
@Module({
  providers: [RetryService],
  exports: [RetryService],
})
export class ErrorHandlingModule {}
