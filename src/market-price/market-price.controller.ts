import { Body, Controller, Get, HttpCode, HttpStatus, Post, Query } from '@nestjs/common';
import { BulkUpdatePricesDto, UpdatePriceDto } from './dto/update-price.dto';
import { MarketPricesResponseDto } from './dto/market-prices-response.dto';
import { MarketPriceService } from './market-price.service';

@Controller('market-prices')
export class MarketPriceController {
  constructor(private readonly marketPriceService: MarketPriceService) {}

  /**
   * Returns manual prices with last update timestamp.
   *
   * GET /market-prices?code=600519
   */
  @Get()
  @HttpCode(HttpStatus.OK)
  getMarketPrices(@Query('code') code?: string): MarketPricesResponseDto {
    const lastUpdate = this.marketPriceService.getLastUpdateTime();
    let prices = this.marketPriceService.getAllPrices();

    if (code) {
      const price = this.marketPriceService.getPrice(code);
      prices = price !== undefined ? { [code]: price } : {};
    }

    return {
      prices,
      lastUpdated: lastUpdate ? lastUpdate.toISOString() : null,
      source: 'manual',
    };
  }

  /**
   * Sets a manual price used by the next ledger update.
   *
   * POST /market-prices/update
   */
  @Post('update')
  @HttpCode(HttpStatus.OK)
  updatePrice(@Body() updatePriceDto: UpdatePriceDto) {
    this.marketPriceService.updatePrice(updatePriceDto.code, updatePriceDto.price);
    return {
      message: `Price updated for ${updatePriceDto.code}`,
      code: updatePriceDto.code,
      price: updatePriceDto.price,
    };
  }

  /**
   * Batch manual prices.
   *
   * POST /market-prices/bulk
   */
  @Post('bulk')
  @HttpCode(HttpStatus.OK)
  bulkUpdatePrices(@Body() bulkUpdatePricesDto: BulkUpdatePricesDto) {
    this.marketPriceService.updatePrices(bulkUpdatePricesDto.prices);
    return {
      message: 'Market prices updated',
      updatedCodes: Object.keys(bulkUpdatePricesDto.prices),
      prices: bulkUpdatePricesDto.prices,
    };
  }

  /**
   * Drops all manual prices.
   *
   * POST /market-prices/reset
   */
  @Post('reset')
  @HttpCode(HttpStatus.OK)
  reset() {
    this.marketPriceService.clearAllPrices();
    return { message: 'Manual prices cleared' };
  }
}
