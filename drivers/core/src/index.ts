export type {
  Driver,
  DriverConfig,
  DriverDependencies,
  DriverFactory,
  DriverLogger,
  LocaleProvider,
  StreamHandlers,
  StreamRequest,
  StreamSignal,
  StreamTransport,
  SubscriberRegistry,
  TokenProvider
} from "./types";
