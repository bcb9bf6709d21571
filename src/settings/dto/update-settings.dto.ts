import { IsBoolean, IsNumber, IsOptional, Max, Min } from 'class-validator';

/** PUT body: the full settings document; omitted percentages are cleared. */
export class UpdateSettingsDto {
  @IsBoolean()
  macro_enabled!: boolean;

  @IsOptional()
  @IsNumber({ allowNaN: false, allowInfinity: false })
  @Min(0)
  @Max(100)
  protein_pct?: number | null;

  @IsOptional()
  @IsNumber({ allowNaN: false, allowInfinity: false })
  @Min(0)
  @Max(100)
  carbs_pct?: number | null;

  @IsOptional()
  @IsNumber({ allowNaN: false, allowInfinity: false })
  @Min(0)
  @Max(100)
  fat_pct?: number | null;
}
