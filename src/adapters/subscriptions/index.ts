export { InMemorySubscriptionGateway } from './memory-subscription.gateway';
