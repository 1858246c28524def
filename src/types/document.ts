/**
 * Wire types for document, share and user payloads.
 *
 * Field names are snake_case to match the JSON the UI consumes.
 */

export const SHARE_TYPES = ['public', 'with_password'] as const;

export type ShareType = typeof SHARE_TYPES[number];

export interface PublicUser {
    id: number;
    email: string;
    full_name: string | null;
    is_active: boolean;
    is_admin: boolean;
    created_at: Date;
}

export interface DocumentResponse {
    id: number;
    filename: string;
    file_md5: string;
    file_size: number;
    mime_type: string;
    file_uuid: string;
    uploader_id: number;
    is_public: boolean;
    download_count: number;
    is_shared: boolean;
    created_at: Date;
    updated_at: Date;
}

export interface ShareResponse {
    filename: string;
    share_uuid?: string | null;
    share_type?: ShareType | null;
    share_code?: string | null;
    share_expired_at?: Date | null;
    is_shared?: boolean;
}

export interface SharedDocumentSummary {
    id: number;
    filename: string;
    share_uuid: string | null;
    share_type: ShareType | null;
    share_code: string | null;
    share_expired_at: Date | null;
    created_at: Date;
    updated_at: Date;
    download_count: number;
    file_size: number;
    mime_type: string;
}

export interface PreviewResponse {
    preview_url: string;
    mime_type: string;
    filename: string;
}

export interface SharedAccessResponse {
    filename: string;
    preview_url: string;
    mime_type: string;
    file_size: number;
}

export interface ShareCheckResponse {
    requires_password: boolean;
    filename: string;
}

export interface TokenResponse {
    access_token: string;
    token_type: 'bearer';
    user: PublicUser;
}

/**
 * The caller of an authenticated request, as attached by the auth middleware.
 */
export interface AuthenticatedUser {
    id: number;
    email: string;
    is_admin: boolean;
}
