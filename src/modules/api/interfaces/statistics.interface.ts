export interface DeliverabilityStatistics {
  from_timestamp: string;
  to_timestamp: string;
  reception_count: number;
  delivered_count: number;
  deferred_count: number;
  bounced_count: number;
  failed_count: number;
  suppressed_count: number;
  opened_count: number;
  clicked_count: number;
}

export interface Bounce {
  classification: string;
  count: number;
}

export interface BounceStatistics {
  from_timestamp: string;
  to_timestamp: string;
  bounces: Bounce[];
}

export interface DeliveryTime {
  recipient_domain?: string;
  delivery_time?: number;
}

export interface DeliveryTimeStatistics {
  from_timestamp: string;
  to_timestamp: string;
  avg_delivery_time: number;
  delivered_count: number;
  delivery_times?: DeliveryTime[];
}

export interface StatisticsResponse<T> {
  object: 'list';
  data: T[];
}
