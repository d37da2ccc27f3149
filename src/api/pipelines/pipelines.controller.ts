import {
  Controller,
  Get,
  Post,
  Patch,
  Delete,
  Body,
  Param,
  HttpCode,
  HttpStatus,
  NotFoundException,
  ParseUUIDPipe,
} from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { PipelinesService } from './pipelines.service';
import { CreatePipelineDto } from '../../dto/create-pipeline.dto';
import { UpdatePipelineDto } from '../../dto/update-pipeline.dto';
import { withConfigErrorsAsBadRequest } from '../http-errors';

@ApiTags('pipelines')
@Controller('pipelines')
export class PipelinesController {
  constructor(private readonly pipelinesService: PipelinesService) {}

  @Get()
  @ApiOperation({ summary: 'List pipelines' })
  async findAll() {
    return this.pipelinesService.findAll();
  }

  // Matrix preview (must be before :id)
  @Get(':id/matrix')
  @ApiOperation({ summary: 'Expand the pipeline matrix into lanes without running anything' })
  async matrix(@Param('id', ParseUUIDPipe) id: string) {
    return withConfigErrorsAsBadRequest(() => this.pipelinesService.previewLanes(id));
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get one pipeline' })
  async findOne(@Param('id', ParseUUIDPipe) id: string) {
    const pipeline = await this.pipelinesService.findOne(id);
    if (!pipeline) throw new NotFoundException('Pipeline not found');
    return pipeline;
  }

  @Post()
  @ApiOperation({ summary: 'Create a pipeline (config is validated and its matrix expanded once)' })
  async create(@Body() dto: CreatePipelineDto) {
    return withConfigErrorsAsBadRequest(() => this.pipelinesService.create(dto));
  }

  @Patch(':id')
  @ApiOperation({ summary: 'Update a pipeline' })
  async update(@Param('id', ParseUUIDPipe) id: string, @Body() dto: UpdatePipelineDto) {
    return withConfigErrorsAsBadRequest(() => this.pipelinesService.update(id, dto));
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Delete a pipeline' })
  async remove(@Param('id', ParseUUIDPipe) id: string) {
    await this.pipelinesService.remove(id);
  }
}
