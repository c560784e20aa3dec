import { Module } from "@nestjs/common";
import { RecordStoreRepository } from "./record-store.repository";
import { FailureLogRepository } from "./failure-log.repository";
import { SourceListReader } from "./source-list.reader";

@Module({
  providers: [RecordStoreRepository, FailureLogRepository, SourceListReader],
  exports: [RecordStoreRepository, FailureLogRepository, SourceListReader],
})
export class StorageModule {}
