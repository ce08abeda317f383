import type { Logger } from "@nestjs/common";
import type { LoggingCapabilities } from "../../base/mixins/logging.mixin";

/**
 * Base interface that all services implement
 */
export interface IBaseService extends LoggingCapabilities {
  readonly logger: Logger;
}
