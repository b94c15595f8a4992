import { IsNumber, IsObject, IsPositive } from 'class-validator';

// Update price for the symbol in the route
export class UpdatePriceDto {
  @IsNumber()
  @IsPositive()
  price!: number;
}

// Update prices for multiple symbols at once
export class BulkUpdatePricesDto {
  @IsObject()
  prices!: Record<string, number>;  // { "AAPL": 180, "MSFT": 340 }
}
