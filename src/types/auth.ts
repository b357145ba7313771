export interface AdminContext {
  id: string;
  roles: string[];
  permissions?: string[];
}
