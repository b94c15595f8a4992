export interface Portfolio {
  id: string;                 // internal UUID
  name: string;               // unique
  description: string;
  createdAt: Date;
}
