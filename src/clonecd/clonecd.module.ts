import { Module } from "@nestjs/common";
import { ConversionEngineService } from "./conversion-engine.service";

@Module({
  providers: [ConversionEngineService],
  exports: [ConversionEngineService],
})
export class CloneCdModule {}
