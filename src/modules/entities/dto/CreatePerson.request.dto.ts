import { IsInt, IsString, MaxLength, Min } from 'class-validator';

export class CreatePersonRequestDto {
  @IsString()
  @MaxLength(100)
  public readonly name!: string;

  @IsInt()
  @Min(1, { message: 'age must be greater than 0' })
  public readonly age!: number;
}
