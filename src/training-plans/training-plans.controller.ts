import {
  Body,
  Controller,
  Get,
  HttpCode,
  NotFoundException,
  Param,
  Post,
  Req,
  UseGuards,
  UsePipes,
  ValidationPipe,
} from '@nestjs/common'
import type { Request } from 'express'
import { CompositorUsage, CompositorUsageGuard, clientKeyFor } from '../compositor-usage/compositor-usage.guard'
import { CompositorUsageService } from '../compositor-usage/compositor-usage.service'
import { toPlanArtifact } from '../plan-assembler/plan-artifact'
import { PlanAssemblerService } from '../plan-assembler/plan-assembler.service'
import type { PlanRequest } from '../plan-assembler/plan-assembler.types'
import { PlanJobsService } from '../plan-jobs/plan-jobs.service'
import { PlanPreviewService } from '../plan-preview/plan-preview.service'
import { GeneratePlanDto, PreviewRequestDto } from './dto/plan-request.dto'
import { toHttpException } from './training-plans.errors'

function toPlanRequest(dto: GeneratePlanDto): PlanRequest {
  return {
    route: dto.route,
    profile: dto.profile,
    weeksToTrain: dto.weeksToTrain,
    sessionsPerWeek: dto.sessionsPerWeek,
    ...(dto.previousAnalysis ? { previousAnalysis: dto.previousAnalysis } : {}),
  }
}

@Controller('training-plans')
@UsePipes(new ValidationPipe({ whitelist: true, forbidNonWhitelisted: true, transform: true }))
export class TrainingPlansController {
  constructor(
    private readonly assembler: PlanAssemblerService,
    private readonly previewService: PlanPreviewService,
    private readonly jobs: PlanJobsService,
    private readonly usage: CompositorUsageService,
  ) {}

  @Post('preview')
  @HttpCode(200)
  @UseGuards(CompositorUsageGuard)
  @CompositorUsage('preview')
  async preview(@Body() dto: PreviewRequestDto, @Req() req: Pick<Request, 'headers' | 'ip'>) {
    try {
      const preview = await this.previewService.preview(dto.route, dto.profile)
      // cached answers cost no compositor call
      if (preview.cache === 'hit') this.usage.refund(clientKeyFor(req), 'preview')
      return preview
    } catch (err) {
      throw toHttpException(err)
    }
  }

  @Post('generate')
  @HttpCode(200)
  @UseGuards(CompositorUsageGuard)
  @CompositorUsage('plan')
  async generate(@Body() dto: GeneratePlanDto) {
    try {
      const plan = await this.assembler.assemble(toPlanRequest(dto))
      return {
        ...toPlanArtifact(plan),
        trainingDays: plan.trainingDays,
        routeFeatures: plan.routeFeatures,
      }
    } catch (err) {
      throw toHttpException(err)
    }
  }

  @Post('jobs')
  @HttpCode(202)
  @UseGuards(CompositorUsageGuard)
  @CompositorUsage('plan')
  startJob(@Body() dto: GeneratePlanDto) {
    return this.jobs.start(toPlanRequest(dto))
  }

  @Get('jobs/:id')
  getJob(@Param('id') id: string) {
    const job = this.jobs.get(id)
    if (!job) {
      throw new NotFoundException(`Plan job ${id} not found`)
    }
    return job
  }
}
