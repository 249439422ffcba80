export interface Project {
  id: string;
  name: string;
  developerName: string;
  investorName: string;
  isActivated: boolean;
  remarks?: string;
  createdBy: string;
  createdAt: string; // ISO timestamp
  updatedAt?: string;
  updatedBy?: string;
}
