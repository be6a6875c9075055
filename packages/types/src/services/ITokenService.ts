/**
 * Client of the external token-issuing service.
 *
 * Tokens are stored per service identifier, e.g. a plugin id. The supervisor
 * uses them to authenticate RPC calls to microservice plugins.
 */
export interface ITokenService {
    storeToken(serviceId: string, token: string): Promise<void>;

    /**
     * @returns The token, or null when none is stored
     */
    getToken(serviceId: string): Promise<string | null>;

    deleteToken(serviceId: string): Promise<void>;
}
