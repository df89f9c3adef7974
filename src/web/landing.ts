// ============================================
// Landing page — static HTML form for the brief endpoint
// ============================================

import { Router } from "express";
import path from "path";
import { fileURLToPath } from "url";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

// src/web and dist/web both sit two levels below the project root
const PUBLIC_DIR = path.join(__dirname, "..", "..", "public");

/**
 * Create router serving the landing page.
 */
export function createLandingRouter(): Router {
  const router = Router();

  router.get("/", (_req, res) => {
    res.sendFile(path.join(PUBLIC_DIR, "index.html"));
  });

  return router;
}
