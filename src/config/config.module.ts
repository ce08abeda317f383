import { Global, Module } from "@nestjs/common";
import { ProviderConfigLoader } from "./provider-config.loader";

@Global()
@Module({
  providers: [ProviderConfigLoader],
  exports: [ProviderConfigLoader],
})
export class ConfigModule {}
