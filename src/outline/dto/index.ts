export * from './extract-outline-request.dto';
export * from './outline-response.dto';
