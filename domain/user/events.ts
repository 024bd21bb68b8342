export type UserRegistered = {
  name: "UserRegistered";
  aggregateId: string;
  occurredAt: Date;
  email: string;
};

export type EmailVerified = {
  name: "EmailVerified";
  aggregateId: string;
  occurredAt: Date;
  email: string;
};

export type UserEmailChanged = {
  name: "UserEmailChanged";
  aggregateId: string;
  occurredAt: Date;
  previousEmail: string;
  email: string;
};

export type UserProfileUpdated = {
  name: "UserProfileUpdated";
  aggregateId: string;
  occurredAt: Date;
};

export type UserLinked = {
  name: "UserLinked";
  aggregateId: string;
  occurredAt: Date;
  externalSubjectId: string;
};

export type UserDomainEvent =
  | UserRegistered
  | EmailVerified
  | UserEmailChanged
  | UserProfileUpdated
  | UserLinked;
