import { BadRequestException, NotFoundException } from '@nestjs/common';
import { EmptyMatrixError } from '../matrix/matrix.errors';
import { withConfigErrorsAsBadRequest } from './http-errors';

describe('withConfigErrorsAsBadRequest', () => {
  it('passes results through', async () => {
    await expect(withConfigErrorsAsBadRequest(() => 42)).resolves.toBe(42);
  });

  it('turns config errors into a 400 naming the error', async () => {
    let caught: unknown;
    try {
      await withConfigErrorsAsBadRequest(() => {
        throw new EmptyMatrixError();
      });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(BadRequestException);
    expect(caught instanceof BadRequestException && caught.getResponse()).toEqual({
      error: 'EmptyMatrixError',
      message: 'Nothing to run: matrix declares no axes',
    });
  });

  it('leaves other errors alone', async () => {
    await expect(
      withConfigErrorsAsBadRequest(async () => {
        throw new NotFoundException('Pipeline not found');
      }),
    ).rejects.toThrow(NotFoundException);
  });
});
