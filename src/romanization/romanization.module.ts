import { Module } from "@nestjs/common";
import { RomanizationService } from "./romanization.service";

@Module({
  providers: [RomanizationService],
  exports: [RomanizationService],
})
export class RomanizationModule {}
