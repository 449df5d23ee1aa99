import { Type } from 'class-transformer';
import { IsInt, IsNotEmpty, IsString, Matches, Min } from 'class-validator';

export class TileParamsDto {
  @IsString()
  @IsNotEmpty()
  @Matches(/^[A-Za-z0-9][\w-]*$/, { message: 'tileset may only contain letters, digits, underscores and dashes' })
  tileset!: string;

  @Type(() => Number)
  @IsInt()
  @Min(0)
  z!: number;

  @Type(() => Number)
  @IsInt()
  @Min(0)
  x!: number;

  @Type(() => Number)
  @IsInt()
  @Min(0)
  y!: number;
}
