import { Duration, Option, Redacted } from "effect";

export type WebhookConfig = Readonly<{
  url: string;
  port: number;
  secret: Option.Option<Redacted.Redacted<string>>;
}>;

export type AppConfig = Readonly<{
  botToken: Redacted.Redacted<string>;
  adminChatId: number;
  domainsFile: string;
  apiUrl: string;
  batchSize: number;
  requestTimeout: Duration.Duration;
  checkInterval: Duration.Duration;
  webhook: Option.Option<WebhookConfig>;
}>;
