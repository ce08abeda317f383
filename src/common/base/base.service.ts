import { WithLogging } from "./mixins/logging.mixin";
import type { IBaseService } from "../types/services/base.types";

class SimpleBase {
  // eslint-disable-next-line @typescript-eslint/no-explicit-any
  constructor(..._args: any[]) {
    // Empty constructor
  }
}

const LoggingBase = WithLogging(SimpleBase);

/**
 * Base service class that provides common logging functionality.
 * All logging methods are inherited from the WithLogging mixin.
 */
export abstract class BaseService extends LoggingBase implements IBaseService {}
