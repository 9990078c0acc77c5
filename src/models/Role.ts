export enum Role {
    ADMIN = 'admin',            // Grants roles and edits pricing rules
    LAB = 'lab',                // Submits quality test reports
    VERIFIER = 'verifier',      // Flags disputed reports
    ORACLE = 'oracle',          // Reserved for external price feeds
    SENSOR = 'sensor'           // Appends raw IoT readings
}

export const ROLES: readonly Role[] = Object.values(Role);

export function isRole(value: string): value is Role {
    return ROLES.some((role) => role === value);
}
