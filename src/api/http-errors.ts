import { BadRequestException } from '@nestjs/common';
import { PipelineConfigError } from '../matrix/matrix.errors';

/**
 * Run work that may reject a pipeline config; config errors become 400s, everything else propagates.
 */
export async function withConfigErrorsAsBadRequest<T>(work: () => Promise<T> | T): Promise<T> {
  try {
    return await work();
  } catch (err) {
    if (err instanceof PipelineConfigError) {
      throw new BadRequestException({ error: err.name, message: err.message });
    }
    throw err;
  }
}
