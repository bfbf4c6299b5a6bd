import { Type } from 'class-transformer'
import {
  IsArray,
  IsInt,
  IsNotEmptyObject,
  IsNumber,
  IsObject,
  IsOptional,
  IsString,
  Max,
  Min,
  ValidateNested,
} from 'class-validator'

export class RouteDto {
  @IsOptional()
  @IsString()
  name?: string

  @IsOptional()
  @IsString()
  grade?: string

  @IsOptional()
  @IsString()
  crag?: string

  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  angles?: string[]

  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  lengths?: string[]

  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  holdTypes?: string[]

  @IsOptional()
  @IsString()
  description?: string

  @IsOptional()
  @IsString()
  style?: string
}

export class ClimberProfileDto {
  @IsOptional()
  @IsString()
  currentGrade?: string

  @IsOptional()
  @IsString()
  maxBoulderGrade?: string

  @IsOptional()
  @IsString()
  strengths?: string

  @IsOptional()
  @IsString()
  weaknesses?: string

  // values are range-checked by the ratings normaliser
  @IsOptional()
  @IsObject()
  attributeRatings?: Record<string, number>

  @IsOptional()
  @IsString()
  attributeRatingsText?: string

  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  facilities?: string[]

  @IsOptional()
  @IsString()
  sessionTime?: string

  @IsOptional()
  @IsNumber()
  @Min(0)
  yearsExperience?: number

  @IsOptional()
  @IsString()
  experience?: string

  @IsOptional()
  @IsString()
  injuries?: string

  @IsOptional()
  @IsInt()
  @Min(5)
  @Max(100)
  age?: number

  @IsOptional()
  @IsString()
  notes?: string
}

export class PreviewRequestDto {
  @IsNotEmptyObject()
  @ValidateNested()
  @Type(() => RouteDto)
  route!: RouteDto

  @IsObject()
  @ValidateNested()
  @Type(() => ClimberProfileDto)
  profile!: ClimberProfileDto
}

export class GeneratePlanDto extends PreviewRequestDto {
  @IsInt()
  @Min(1)
  @Max(52)
  weeksToTrain!: number

  @IsInt()
  @Min(1)
  @Max(7)
  sessionsPerWeek!: number

  @IsOptional()
  @IsString()
  previousAnalysis?: string
}
