/**
 * Tramway
 *
 * Exports the application, routing, lifecycle, middleware base classes,
 * request/response types and the Node server bridge.
 *
 * @module tramway
 */

// Core
export { Tramway, type TramwayOptions } from './Tramway';
export { TramwayRequest } from './TramwayRequest';
export { State } from './State';
export { Headers, FrozenHeaders, type HeadersInit } from './headers';
export {
  TramwayResponse,
  EmptyResponse,
  PlainTextResponse,
  HTMLResponse,
  JSONResponse,
  type ResponseBody,
  type ResponseInit,
} from './responses';

// Routing
export { Route, classifyHandlerResult, toResponse, type RouteOptions, type RouteMatch, type HandlerOutcome } from './routing/Route';
export { Router, type RouterOptions, type Resolution, type RouteShortcutOptions } from './routing/Router';
export { compilePath, PathTemplate, type PathSegment } from './routing/PathTemplate';
export {
  BASE_CONVERTERS,
  StringConverter,
  IntConverter,
  FloatConverter,
  UUIDConverter,
  PathConverter,
  mergeConverters,
  type Converter,
  type ConverterMap,
} from './routing/converters';

// Lifecycle
export { lifespan, type LifespanHandler, type LifespanPhase } from './lifecycle/LifespanHandler';
export { LifecycleRegistry } from './lifecycle/LifecycleRegistry';
export { LifecycleCoordinator, type LifecycleState } from './lifecycle/LifecycleCoordinator';

// Middleware
export { MiddlewareChain } from './middlewares/MiddlewareChain';
export { ExceptionMiddleware, type ExceptionMiddlewareOptions } from './middlewares/ExceptionMiddleware';

// Error classes
export {
  HttpException,
  BadRequestException,
  NotFoundException,
  MethodNotAllowedException,
  InternalServerErrorException,
  TramwayError,
  PathTemplateError,
  RouteAlreadyExistsError,
  InvalidRouterError,
  MiddlewareLoadError,
  ClientDisconnectedError,
  LifespanProtocolError,
} from './errors';

// Configuration and logging
export { loadConfig, resolveConfig, type TramwayConfig, type TramwayConfigInput } from './config';
export { createDefaultLogger, createSilentLogger, type ServerLogger } from './logger';

// Factory functions
export { createTramway, createProductionApp, createDevelopmentApp } from './utils/factory';

// Server bridge
export { NodeServer, type NodeServerOptions } from './server/NodeServer';
export { MessageQueue } from './utils/channel';

// Default base classes
export { ValidationService, ConfigService, MiddlewareService } from './defaults';

// Types
export * from './types';
