import { Module } from '@nestjs/common';
import { AppController } from './app.controller';
import { ConfigModule } from './config/config.module';
import { PriceCatalogModule } from './price-catalog/price-catalog.module';
import { PortfolioModule } from './portfolio/portfolio.module';

@Module({
  imports: [ConfigModule, PriceCatalogModule, PortfolioModule],
  controllers: [AppController],
})
export class AppModule {}
