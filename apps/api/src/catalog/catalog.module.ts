import { Module } from '@nestjs/common';
import { CatalogRepository } from './catalog.repository';
import { CatalogSnapshotLoader } from './catalog-snapshot.loader';

@Module({
  providers: [CatalogRepository, CatalogSnapshotLoader],
  exports: [CatalogSnapshotLoader],
})
export class CatalogModule {}
