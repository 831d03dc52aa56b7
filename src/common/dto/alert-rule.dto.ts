import {
  IsBoolean,
  IsDate,
  IsDefined,
  IsIn,
  IsInt,
  IsNumber,
  IsOptional,
  IsString,
  Matches,
  Max,
  Min,
} from 'class-validator';
import { Transform, Type } from 'class-transformer';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import {
  COMPARISON_OPERATORS,
  ComparisonOperator,
  DATA_TYPES,
  DataType,
  MAX_PAGE_SIZE,
  WARNING_LEVELS,
  WarningLevel,
} from '../constants/alert-rule.constants';

function toBoolean({ value }: { value: unknown }): unknown {
  if (value === 'true' || value === '1') return true;
  if (value === 'false' || value === '0') return false;
  return value;
}

/**
 * Body of create and update requests. Update is a full replace, so both use
 * the same shape.
 */
export class AlertRuleInputDto {
  @ApiProperty({ example: 1001 })
  @IsDefined()
  @IsInt()
  @Min(1)
  channel_id!: number;

  @ApiProperty({ enum: DATA_TYPES, example: 'T' })
  @IsDefined()
  @IsIn([...DATA_TYPES])
  data_type!: DataType;

  @ApiProperty({ example: 1 })
  @IsDefined()
  @IsInt()
  @Min(1)
  point_id!: number;

  @ApiProperty({ example: 'temp-high' })
  @IsDefined()
  @IsString()
  @Matches(/\S/, { message: 'rule_name must not be empty' })
  rule_name!: string;

  @ApiProperty({ enum: WARNING_LEVELS, example: 2 })
  @IsDefined()
  @IsIn([...WARNING_LEVELS])
  warning_level!: WarningLevel;

  @ApiProperty({ enum: COMPARISON_OPERATORS, example: '>' })
  @IsDefined()
  @IsIn([...COMPARISON_OPERATORS])
  operator!: ComparisonOperator;

  @ApiProperty({ example: 85.0 })
  @IsDefined()
  @IsNumber({ allowNaN: false, allowInfinity: false })
  value!: number;

  @ApiPropertyOptional({ default: true })
  @IsOptional()
  @IsBoolean()
  enabled?: boolean;

  @ApiPropertyOptional({ default: '' })
  @IsOptional()
  @IsString()
  description?: string;
}

export class ListAlertRulesQueryDto {
  @ApiPropertyOptional()
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  channel_id?: number;
}

export class SearchAlertRulesQueryDto {
  @ApiPropertyOptional({ description: 'Matches rule name, description, channel id or point id' })
  @IsOptional()
  @IsString()
  keyword?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  channel_id?: number;

  @ApiPropertyOptional({ enum: DATA_TYPES })
  @IsOptional()
  @IsIn([...DATA_TYPES])
  data_type?: DataType;

  @ApiPropertyOptional({ enum: WARNING_LEVELS })
  @IsOptional()
  @Type(() => Number)
  @IsIn([...WARNING_LEVELS])
  warning_level?: WarningLevel;

  @ApiPropertyOptional()
  @IsOptional()
  @Transform(toBoolean)
  @IsBoolean()
  enabled?: boolean;

  @ApiPropertyOptional({ description: 'Lower bound on created_at' })
  @IsOptional()
  @Type(() => Date)
  @IsDate()
  start_time?: Date;

  @ApiPropertyOptional({ description: 'Upper bound on created_at' })
  @IsOptional()
  @Type(() => Date)
  @IsDate()
  end_time?: Date;

  @ApiPropertyOptional({ default: 1 })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  page?: number;

  @ApiPropertyOptional({ default: 10 })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(MAX_PAGE_SIZE)
  page_size?: number;
}
