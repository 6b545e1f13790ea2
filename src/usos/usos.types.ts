/** An OAuth1 token and its secret; used for both the temporary and the access pair. */
export interface OAuthTokenPair {
  key: string;
  secret: string;
}

export interface HandshakeStart {
  authorizationUrl: string;
  requestToken: OAuthTokenPair;
}

/**
 * The subset of the USOS user record this service reads. Fields USOS leaves
 * out are `undefined`; fields it reports as null stay null.
 */
export interface UsosProfile {
  id?: string | null;
  first_name?: string | null;
  last_name?: string | null;
  student_status?: number | null;
  staff_status?: number | null;
  email?: string | null;
  has_email?: boolean | null;
  profile_url?: string | null;
}

export interface UsosSettings {
  baseUrl: string;
  consumerKey: string;
  consumerSecret: string;
  /** Sent with the request-token call when non-empty. */
  scopes: string[];
  timeoutMs: number;
}
