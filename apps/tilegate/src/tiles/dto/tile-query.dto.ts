import { IsOptional, IsString, Matches } from 'class-validator';

export class TileQueryDto {
  @IsOptional()
  @IsString()
  @Matches(/^[\w.-]+$/, { message: 'extension may only contain letters, digits, dots and dashes' })
  extension?: string;
}
