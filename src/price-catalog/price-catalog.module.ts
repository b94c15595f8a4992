import { Module } from '@nestjs/common';
import { PriceCatalogService } from './price-catalog.service';
import { PriceCatalogController } from './price-catalog.controller';

@Module({
  controllers: [PriceCatalogController],
  providers: [PriceCatalogService],
  exports: [PriceCatalogService],
})
export class PriceCatalogModule {}
