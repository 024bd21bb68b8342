export type ExperienceDomainEvent =
  | {
      name: "ExperienceCreated";
      aggregateId: string;
      occurredAt: Date;
      userId: string;
    }
  | {
      name: "ExperienceUpdated";
      aggregateId: string;
      occurredAt: Date;
    }
  | {
      name: "ExperienceVisibilityChanged";
      aggregateId: string;
      occurredAt: Date;
      isPublic: boolean;
    };
