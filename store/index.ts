import { Store, type StoreConfig, type EffectMode } from './Store';
import { QueueEventLoop, type QueueEventLoopOptions } from './loop/QueueEventLoop';
import { specReducer, type SpecContext, type SpecProducer } from './specReducer';

export {
  type StoreConfig,
  type EffectMode,
  type QueueEventLoopOptions,
  type SpecContext,
  type SpecProducer,
  Store,
  QueueEventLoop,
  specReducer,
};
