export interface Category {
  id: string;
  name: string;
  identificationRegex?: string; // matched against entry descriptions on import
  color?: string;
  description?: string;
  isActive: boolean;
  createdBy: string;
  createdAt: string;
  updatedAt?: string;
  updatedBy?: string;
}
