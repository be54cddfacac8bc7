import { IsInt, IsOptional, IsString, MaxLength, Min } from 'class-validator';

/** PATCH body: any subset of the writable fields. */
export class UpdatePersonRequestDto {
  @IsOptional()
  @IsString()
  @MaxLength(100)
  public readonly name?: string;

  @IsOptional()
  @IsInt()
  @Min(1, { message: 'age must be greater than 0' })
  public readonly age?: number;
}
