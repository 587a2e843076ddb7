import { type Action, type ActionKind, type ActionOf, kind, variant, converts } from './actions/Action';
import {
  type ActionDomain,
  type DomainInput,
  type MergeActions,
  actions,
  asDomain,
  simplify,
  mergeDomains,
  findConvertible,
  areCompatible,
  routeFor,
} from './actions/ActionDomain';
import { type Handler, type Converter, Dispatcher } from './Dispatcher';
import { type NoDeps, type MergeDeps, mergeDeps } from './Deps';
import type { EventLoop, Procedure } from './loop/EventLoop';
import { EventLoopHandle } from './loop/EventLoopHandle';
import { Context } from './Context';
import {
  type Effect,
  type EffectFn,
  noop,
  isEmptyEffect,
  sequence,
  sequenceAll,
  liftEffect,
} from './Effect';
import { type Result, result, isResult, liftResult } from './Result';
import { type Reducer, type EffectHandler, invokeReducer } from './invokeReducer';
import {
  IncompatibleActionsError,
  UnhandledActionError,
  ContextExpiredError,
  StoreClosedError,
} from './errors';

export {
  type Action,
  type ActionKind,
  type ActionOf,
  type ActionDomain,
  type DomainInput,
  type MergeActions,
  type Handler,
  type Converter,
  type NoDeps,
  type MergeDeps,
  type EventLoop,
  type Procedure,
  type Effect,
  type EffectFn,
  type Result,
  type Reducer,
  type EffectHandler,
  kind,
  variant,
  converts,
  actions,
  asDomain,
  simplify,
  mergeDomains,
  findConvertible,
  areCompatible,
  routeFor,
  Dispatcher,
  mergeDeps,
  EventLoopHandle,
  Context,
  noop,
  isEmptyEffect,
  sequence,
  sequenceAll,
  liftEffect,
  result,
  isResult,
  liftResult,
  invokeReducer,
  IncompatibleActionsError,
  UnhandledActionError,
  ContextExpiredError,
  StoreClosedError,
};
