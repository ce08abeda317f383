import { Module } from "@nestjs/common";
import { LookupModule } from "@/lookup/lookup.module";
import { TranslationModule } from "@/translation/translation.module";
import { LookupPageController } from "./lookup-page.controller";

@Module({
  imports: [LookupModule, TranslationModule],
  controllers: [LookupPageController],
})
export class PresentationModule {}
