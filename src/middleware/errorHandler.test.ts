import { NextFunction, Request, Response } from 'express';
import { AppError, ConfigError, RosterFileError, ValidationError, asyncHandler, errorHandler, notFound } from './errorHandler';

function mockResponse() {
  const json = jest.fn();
  const status = jest.fn().mockReturnValue({ json });
  const res = { status } as unknown as Response;
  return { res, status, json };
}

const req = { originalUrl: '/api/v1/missing', url: '/api/v1/missing', method: 'GET', ip: '127.0.0.1' } as unknown as Request;

describe('error classes', () => {
  it('labels roster file errors with the file name', () => {
    const error = new RosterFileError('roster.xlsx', 'not an .xlsx workbook');

    expect(error).toBeInstanceOf(AppError);
    expect(error.message).toBe('roster.xlsx: not an .xlsx workbook');
    expect(error.statusCode).toBe(422);
    expect(error.name).toBe('RosterFileError');
  });

  it('marks configuration errors as non-operational', () => {
    const error = new ConfigError('bad');
    expect(error.isOperational).toBe(false);
    expect(error.statusCode).toBe(500);
  });
});

describe('errorHandler', () => {
  const next: NextFunction = jest.fn();

  it('responds with the status of an AppError', () => {
    const { res, status, json } = mockResponse();

    errorHandler(new RosterFileError('roster.xlsx', 'workbook has no worksheets'), req, res, next);

    expect(status).toHaveBeenCalledWith(422);
    expect(json).toHaveBeenCalledWith({
      error: { message: 'roster.xlsx: workbook has no worksheets', status: 422 }
    });
  });

  it('includes validation details', () => {
    const { res, json } = mockResponse();
    const details = [{ path: 'format', msg: 'format must be xlsx or json' }];

    errorHandler(new ValidationError('Invalid request', details), req, res, next);

    expect(json).toHaveBeenCalledWith({
      error: { message: 'Invalid request', status: 400, errors: details }
    });
  });

  it('keeps the client status of body parser errors', () => {
    const { res, status } = mockResponse();
    const tooLarge = Object.assign(new Error('request entity too large'), { status: 413 });

    errorHandler(tooLarge, req, res, next);

    expect(status).toHaveBeenCalledWith(413);
  });

  it('answers unexpected errors with 500', () => {
    const { res, status, json } = mockResponse();

    errorHandler(new Error('boom'), req, res, next);

    expect(status).toHaveBeenCalledWith(500);
    expect(json).toHaveBeenCalledWith({ error: { message: 'boom', status: 500 } });
  });
});

describe('notFound', () => {
  it('forwards a 404 AppError', () => {
    const next = jest.fn();

    notFound(req, mockResponse().res, next);

    expect(next).toHaveBeenCalledWith(expect.any(AppError));
    expect(next.mock.calls[0][0]).toMatchObject({ statusCode: 404, message: 'Not found - /api/v1/missing' });
  });
});

describe('asyncHandler', () => {
  it('passes rejections to next', async () => {
    const next = jest.fn();
    const failure = new AppError('nope', 400);

    await asyncHandler(async () => {
      throw failure;
    })(req, mockResponse().res, next);

    expect(next).toHaveBeenCalledWith(failure);
  });
});
