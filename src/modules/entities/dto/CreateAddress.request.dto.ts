import { IsInt, IsString, MaxLength, Min } from 'class-validator';

export class CreateAddressRequestDto {
  @IsString()
  @MaxLength(100)
  public readonly street!: string;

  @IsString()
  @MaxLength(50)
  public readonly city!: string;

  @IsInt()
  @Min(1)
  public readonly person_id!: number;
}
