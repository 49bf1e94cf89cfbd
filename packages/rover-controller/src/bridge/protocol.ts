import { z } from 'zod';

/** rosbridge v2 operations used by the controller. */
export const RosbridgeOp = {
  ADVERTISE: 'advertise',
  UNADVERTISE: 'unadvertise',
  PUBLISH: 'publish',
  SUBSCRIBE: 'subscribe',
  UNSUBSCRIBE: 'unsubscribe',
  STATUS: 'status',
} as const;

export type RosbridgeOpValue = (typeof RosbridgeOp)[keyof typeof RosbridgeOp];

export const AdvertiseSchema = z.object({
  op: z.literal(RosbridgeOp.ADVERTISE),
  id: z.string().optional(),
  topic: z.string(),
  type: z.string(),
});

export const UnadvertiseSchema = z.object({
  op: z.literal(RosbridgeOp.UNADVERTISE),
  id: z.string().optional(),
  topic: z.string(),
});

export const SubscribeSchema = z.object({
  op: z.literal(RosbridgeOp.SUBSCRIBE),
  id: z.string().optional(),
  topic: z.string(),
  type: z.string(),
});

export const UnsubscribeSchema = z.object({
  op: z.literal(RosbridgeOp.UNSUBSCRIBE),
  id: z.string().optional(),
  topic: z.string(),
});

export const PublishSchema = z.object({
  op: z.literal(RosbridgeOp.PUBLISH),
  id: z.string().optional(),
  topic: z.string(),
  msg: z.record(z.unknown()),
});

export const StatusSchema = z.object({
  op: z.literal(RosbridgeOp.STATUS),
  id: z.string().optional(),
  level: z.enum(['info', 'warning', 'error', 'none']),
  msg: z.string(),
});

export const OutgoingOperationSchema = z.discriminatedUnion('op', [
  AdvertiseSchema,
  UnadvertiseSchema,
  SubscribeSchema,
  UnsubscribeSchema,
  PublishSchema,
]);

export const IncomingOperationSchema = z.discriminatedUnion('op', [
  PublishSchema,
  StatusSchema,
]);

export type OutgoingOperation = z.infer<typeof OutgoingOperationSchema>;
export type IncomingOperation = z.infer<typeof IncomingOperationSchema>;
export type AdvertiseOperation = z.infer<typeof AdvertiseSchema>;
export type UnadvertiseOperation = z.infer<typeof UnadvertiseSchema>;
export type SubscribeOperation = z.infer<typeof SubscribeSchema>;
export type UnsubscribeOperation = z.infer<typeof UnsubscribeSchema>;
export type PublishOperation = z.infer<typeof PublishSchema>;

/** std_msgs/Float32. rosbridge sends non-finite floats as null. */
export const Float32MsgSchema = z.object({
  data: z.number().nullable(),
});

export function createAdvertise(topic: string, type: string): AdvertiseOperation {
  return { op: RosbridgeOp.ADVERTISE, topic, type };
}

export function createUnadvertise(topic: string): UnadvertiseOperation {
  return { op: RosbridgeOp.UNADVERTISE, topic };
}

export function createSubscribe(topic: string, type: string): SubscribeOperation {
  return { op: RosbridgeOp.SUBSCRIBE, topic, type };
}

export function createUnsubscribe(topic: string): UnsubscribeOperation {
  return { op: RosbridgeOp.UNSUBSCRIBE, topic };
}

export function createPublish(topic: string, msg: Record<string, unknown>): PublishOperation {
  return { op: RosbridgeOp.PUBLISH, topic, msg };
}
