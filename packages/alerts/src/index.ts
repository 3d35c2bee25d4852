export { LogAlertSink } from "./LogAlertSink.js";
export {
  WebhookAlertSink,
  formatAlertContent,
  toWebhookBody,
  type WebhookAlertSinkOptions,
  type WebhookBody,
} from "./WebhookAlertSink.js";
