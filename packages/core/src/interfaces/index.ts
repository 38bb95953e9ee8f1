export type {
  IAddressProber,
  INotifier,
  Clock,
  WatchLogger,
} from './collaborators.js';
