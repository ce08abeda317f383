import { Injectable, Logger } from "@nestjs/common";
import { readFileSync } from "fs";
import { resolve } from "path";
import { plainToInstance } from "class-transformer";
import { validateSync, type ValidationError } from "class-validator";
import { ConfigurationError } from "@/common/errors";
import { asError } from "@/common/utils/error.utils";
import type { ProviderSpec } from "@/common/types/translation";
import { ProviderSpecDto } from "./dto/provider-spec.dto";
import { ENV } from "./environment.constants";

export const PROVIDER_SPEC_DEFAULTS = {
  enabled: true,
  method: "GET",
  timeoutMs: 5000,
  maxRetries: 2,
  retryDelayMs: 500,
  backoffMultiplier: 2,
  rejectEcho: false,
} as const;

function describeValidationErrors(errors: ValidationError[], parentPath = ""): string[] {
  const messages: string[] = [];
  for (const error of errors) {
    const path = parentPath ? `${parentPath}.${error.property}` : error.property;
    for (const message of Object.values(error.constraints ?? {})) {
      messages.push(`${path}: ${message}`);
    }
    messages.push(...describeValidationErrors(error.children ?? [], path));
  }
  return messages;
}

/**
 * Loads the ordered translation provider chain from a JSON file
 */
@Injectable()
export class ProviderConfigLoader {
  private readonly logger = new Logger(ProviderConfigLoader.name);

  /**
   * Read, validate and freeze the provider specs. Array order is chain order.
   */
  loadProviderSpecs(configPath: string = ENV.TRANSLATION.PROVIDERS_FILE): readonly ProviderSpec[] {
    const providersPath = resolve(process.cwd(), configPath);
    this.logger.log(`Loading translation providers from: ${providersPath}`);

    let rawConfig: unknown;
    try {
      rawConfig = JSON.parse(readFileSync(providersPath, "utf8"));
    } catch (error) {
      throw new ConfigurationError(`Unable to read provider configuration ${providersPath}: ${asError(error).message}`, {
        cause: error,
      });
    }

    const specs = this.parseProviderSpecs(rawConfig);
    const enabled = specs.filter(spec => spec.enabled).map(spec => spec.name);
    this.logger.log(`Loaded ${specs.length} translation providers (enabled: ${enabled.join(", ") || "none"})`);

    return specs;
  }

  /**
   * Validate an already parsed configuration document
   */
  parseProviderSpecs(rawConfig: unknown): readonly ProviderSpec[] {
    if (!Array.isArray(rawConfig)) {
      throw new ConfigurationError("Provider configuration must be an array");
    }
    if (rawConfig.length === 0) {
      throw new ConfigurationError("Provider configuration must declare at least one provider");
    }

    const specs: ProviderSpec[] = [];
    const seenNames = new Set<string>();

    rawConfig.forEach((entry: unknown, index: number) => {
      const spec = this.toProviderSpec(entry, index);
      if (seenNames.has(spec.name)) {
        throw new ConfigurationError(`Duplicate provider name: ${spec.name}`);
      }
      seenNames.add(spec.name);
      specs.push(spec);
    });

    return Object.freeze(specs);
  }

  private toProviderSpec(entry: unknown, index: number): ProviderSpec {
    if (typeof entry !== "object" || entry === null || Array.isArray(entry)) {
      throw new ConfigurationError(`Provider #${index} must be an object`);
    }

    const dto = plainToInstance(ProviderSpecDto, entry);
    const errors = validateSync(dto, { forbidUnknownValues: true });
    if (errors.length > 0) {
      const details = describeValidationErrors(errors).join("; ");
      throw new ConfigurationError(`Invalid provider #${index}: ${details}`);
    }

    const method = dto.method ?? PROVIDER_SPEC_DEFAULTS.method;
    if (dto.body && method !== "POST") {
      throw new ConfigurationError(`Provider ${dto.name} declares a body but uses ${method}`);
    }

    return Object.freeze({
      name: dto.name,
      description: dto.description ?? dto.name,
      enabled: dto.enabled ?? PROVIDER_SPEC_DEFAULTS.enabled,
      method,
      url: dto.url,
      query: Object.freeze({ ...dto.query }),
      body: dto.body ? Object.freeze({ ...dto.body }) : undefined,
      headers: Object.freeze({ ...dto.headers }),
      responsePath: dto.responsePath,
      successCheck: dto.successCheck
        ? Object.freeze({ path: dto.successCheck.path, equals: dto.successCheck.equals })
        : undefined,
      rejectEcho: dto.rejectEcho ?? PROVIDER_SPEC_DEFAULTS.rejectEcho,
      timeoutMs: dto.timeoutMs ?? PROVIDER_SPEC_DEFAULTS.timeoutMs,
      maxRetries: dto.maxRetries ?? PROVIDER_SPEC_DEFAULTS.maxRetries,
      retryDelayMs: dto.retryDelayMs ?? PROVIDER_SPEC_DEFAULTS.retryDelayMs,
      backoffMultiplier: dto.backoffMultiplier ?? PROVIDER_SPEC_DEFAULTS.backoffMultiplier,
    });
  }
}
