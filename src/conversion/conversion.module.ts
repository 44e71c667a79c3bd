import { Module } from "@nestjs/common";
import { CloneCdModule } from "../clonecd/clonecd.module";
import { FileStorageModule } from "../file-storage/file-storage.module";
import { CLI_OUTPUT } from "./config";
import { ConversionCliService } from "./conversion-cli.service";
import { ImageConversionService } from "./image-conversion.service";

@Module({
  imports: [CloneCdModule, FileStorageModule],
  providers: [
    ImageConversionService,
    ConversionCliService,
    {
      provide: CLI_OUTPUT,
      useValue: process.stdout,
    },
  ],
  exports: [ConversionCliService],
})
export class ConversionModule {}
