import { Express } from "express";
import { AgentServices } from "../agent";

export interface IngressAdapter {
  register(app: Express, services: AgentServices): void;
}
