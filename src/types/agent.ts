import { ActiveDomain, SessionStage } from './session';

export type Channel = 'web' | 'sms' | 'email' | 'api';

export interface IncomingMessage {
  session_id: string;
  message: string;
  channel: Channel;
}

export type TurnAction =
  | 'greeted'
  | 'clarified'
  | 'collecting'
  | 'record_created'
  | 'awaiting_info'
  | 'retry';

export interface TurnResponse {
  success: boolean;
  session_id: string;
  response: string;
  action_taken: TurnAction;
  domain: ActiveDomain;
  stage: SessionStage;
  missing_fields: string[];
  record_id?: string;
  warnings: string[];
  retryable?: boolean;
}
