"use client";
import React from "react";
import { UploadController, type UploadControllerOptions } from "@/lib/upload-controller";

/** One controller per mounted component, bound to React through useSyncExternalStore. */
export function useUploadController(options?: UploadControllerOptions) {
  const [controller] = React.useState(() => new UploadController(options));
  const state = React.useSyncExternalStore(controller.subscribe, controller.getState, controller.getState);
  return { controller, state };
}
