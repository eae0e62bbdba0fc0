export type Operator = {
  id: string;
  token: string;
  callbackUrl: string;
  createdAt: Date;
};

export type NewOperator = {
  id: string;
  token: string;
  callbackUrl: string;
};

export type OperatorRecord = {
  id: string;
  token: string;
  callback_url: string;
  created_at: Date;
};
