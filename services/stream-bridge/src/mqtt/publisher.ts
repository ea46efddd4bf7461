import mqtt, { type MqttClient as RawMqttClient } from "mqtt";

export interface PublishOptions {
  retain?: boolean;
}

export interface MqttPublisher {
  publish(topic: string, payload: string, options?: PublishOptions): Promise<void>;
  disconnect(): Promise<void>;
}

export class RealMqttPublisher implements MqttPublisher {
  private readonly client: RawMqttClient;

  constructor(brokerUrl: string, clientId = `hc-bridge-${process.pid}`) {
    this.client = mqtt.connect(brokerUrl, { clientId });
  }

  async publish(topic: string, payload: string, options: PublishOptions = {}): Promise<void> {
    await new Promise<void>((resolve, reject) => {
      this.client.publish(topic, payload, { qos: 0, retain: options.retain ?? false }, (err?: Error) => {
        if (err) {
          reject(err);
          return;
        }
        resolve();
      });
    });
  }

  async disconnect(): Promise<void> {
    await new Promise<void>((resolve, reject) => {
      this.client.end(false, {}, (err?: Error) => {
        if (err) {
          reject(err);
          return;
        }
        resolve();
      });
    });
  }
}
