import { IsIn, IsInt, IsOptional, IsString, MaxLength, Min } from 'class-validator';
import { Transform } from 'class-transformer';
import { PHONE_TYPES } from '../entities.registry';
import { normalizePhoneType } from './phone-type';

export class UpdatePhoneRequestDto {
  @IsOptional()
  @IsString()
  @MaxLength(20)
  public readonly number?: string;

  @IsOptional()
  @Transform(({ value }: { value: unknown }) => normalizePhoneType(value))
  @IsIn([...PHONE_TYPES], { message: 'type must be home, work, or mobile' })
  public readonly type?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  public readonly person_id?: number;
}
