/** Opaque bearer credential handed to mobile clients. One per principal. */
export interface AuthTokenRecord {
  /** 40 hex characters. */
  key: string;
  principalId: number;
  createdAt: Date;
}
