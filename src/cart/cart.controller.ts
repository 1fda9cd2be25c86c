import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseIntPipe,
  Patch,
  Post,
  Put,
} from '@nestjs/common';
import { ApiHeader, ApiOperation, ApiTags } from '@nestjs/swagger';
import { CartService } from './cart.service';
import { AddCartItemDto, UpdateCartItemDto } from './dto/cart-item.dto';
import { SetDiscountDto, SetPaymentMethodDto, SetTaxRateDto } from './dto/cart-settings.dto';

@ApiTags('Cart')
@ApiHeader({ name: 'x-session-id', required: true, description: 'Register / browser session id' })
@Controller('cart')
export class CartController {
  constructor(private readonly cartService: CartService) {}

  @Get()
  @ApiOperation({ summary: 'Current cart with totals' })
  getCart() {
    return this.cartService.summary();
  }

  @Post('items')
  @ApiOperation({ summary: 'Add a medicine to the cart' })
  addItem(@Body() dto: AddCartItemDto) {
    return this.cartService.addItem(dto.medicineId, dto.quantity);
  }

  @Patch('items/:medicineId')
  @ApiOperation({ summary: 'Change a line quantity (0 removes it)' })
  updateItem(
    @Param('medicineId', ParseIntPipe) medicineId: number,
    @Body() dto: UpdateCartItemDto,
  ) {
    return this.cartService.updateQuantity(medicineId, dto.quantity);
  }

  @Delete('items/:medicineId')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Remove a line from the cart' })
  removeItem(@Param('medicineId', ParseIntPipe) medicineId: number) {
    this.cartService.removeItem(medicineId);
  }

  @Put('discount')
  @ApiOperation({ summary: 'Set the cart discount amount' })
  setDiscount(@Body() dto: SetDiscountDto) {
    return this.cartService.setDiscount(dto.amount);
  }

  @Put('tax-rate')
  @ApiOperation({ summary: 'Set the cart tax rate' })
  setTaxRate(@Body() dto: SetTaxRateDto) {
    return this.cartService.setTaxRate(dto.percent);
  }

  @Put('payment-method')
  @ApiOperation({ summary: 'Set the payment method' })
  setPaymentMethod(@Body() dto: SetPaymentMethodDto) {
    return this.cartService.setPaymentMethod(dto.method);
  }

  @Delete()
  @ApiOperation({ summary: 'Empty the cart and reset its settings' })
  clear() {
    return this.cartService.clear();
  }

  @Delete('session')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Discard the cart session' })
  discardSession() {
    this.cartService.discardSession();
  }
}
