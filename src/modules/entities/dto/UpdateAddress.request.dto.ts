import { IsInt, IsOptional, IsString, MaxLength, Min } from 'class-validator';

export class UpdateAddressRequestDto {
  @IsOptional()
  @IsString()
  @MaxLength(100)
  public readonly street?: string;

  @IsOptional()
  @IsString()
  @MaxLength(50)
  public readonly city?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  public readonly person_id?: number;
}
