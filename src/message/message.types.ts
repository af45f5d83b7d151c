export interface Message {
  msg_id: string;
  mentorship_id: string;
  sender_id: string;
  body: string;
  created_at: Date;
}

export interface MessageView extends Message {
  sender_name: string;
}
