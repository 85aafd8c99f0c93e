import {
  IsEmail,
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsPositive,
  IsString,
  Length,
  ValidateNested,
} from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';

export class CheckoutCustomerDto {
  @ApiPropertyOptional({ example: 'Test Customer' })
  @IsOptional()
  @IsString()
  name?: string;

  @ApiProperty({ example: 'customer@example.com' })
  @IsEmail()
  email!: string;

  @ApiPropertyOptional({ example: '01711111111' })
  @IsOptional()
  @IsString()
  phone?: string;
}

export class BillingAddressDto {
  @ApiPropertyOptional({ example: 'House 1, Road 2' })
  @IsOptional()
  @IsString()
  address1?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  address2?: string;

  @ApiPropertyOptional({ example: 'Dhaka' })
  @IsOptional()
  @IsString()
  city?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  state?: string;

  @ApiPropertyOptional({ example: '1207' })
  @IsOptional()
  @IsString()
  postalCode?: string;

  @ApiPropertyOptional({ example: 'Bangladesh' })
  @IsOptional()
  @IsString()
  country?: string;
}

/**
 * DTO for creating a hosted checkout session
 */
export class CreateCheckoutDto {
  @ApiProperty({ description: 'Order id in the checkout host', example: 42 })
  @Type(() => Number)
  @IsInt()
  @IsPositive()
  orderId!: number;

  @ApiProperty({ description: 'Amount in major units', example: 1500 })
  @Type(() => Number)
  @IsNumber({ maxDecimalPlaces: 2 })
  @IsPositive()
  amount!: number;

  @ApiProperty({ description: 'ISO 4217 currency code', example: 'BDT' })
  @IsString()
  @Length(3, 3)
  currency!: string;

  @ApiProperty({ type: CheckoutCustomerDto })
  @ValidateNested()
  @Type(() => CheckoutCustomerDto)
  customer!: CheckoutCustomerDto;

  @ApiPropertyOptional({ type: BillingAddressDto })
  @IsOptional()
  @ValidateNested()
  @Type(() => BillingAddressDto)
  billingAddress?: BillingAddressDto;

  @ApiPropertyOptional({ example: 'Course Purchase' })
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  description?: string;

  @ApiPropertyOptional({ example: 'Example Academy' })
  @IsOptional()
  @IsString()
  storeName?: string;
}

/**
 * Response DTO for checkout session creation
 */
export class CheckoutResponseDto {
  @ApiProperty({
    description: 'Hosted payment page to redirect the payer to',
    example: 'https://sandbox.sslcommerz.com/EasyCheckOut/testcde',
  })
  redirectUrl!: string;

  @ApiProperty({
    description: 'Transaction id sent to the gateway',
    example: 'ORDER-42-1700000000',
  })
  tranId!: string;
}
