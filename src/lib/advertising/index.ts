export {
  ServiceAdvertiser,
  buildPublishArgs,
  type AdvertisementOptions,
  type PublisherProcess,
  type ServiceAdvertiserOptions,
  type SpawnPublisher,
} from './service-advertiser.js';
