export interface StoppableServer {
  close(callback: (error?: Error) => void): unknown;
}

export interface StoppableScheduler {
  stop(): void;
  drain(): Promise<void>;
}

export interface RunningServices {
  server: StoppableServer;
  uploadScheduler: StoppableScheduler;
  mongo: { close(): Promise<void> } | null;
}

/**
 * Stops intake first, then lets in-flight uploads record their outcome before the store
 * connection goes away.
 */
export async function stopServices({ server, uploadScheduler, mongo }: RunningServices): Promise<void> {
  uploadScheduler.stop();
  await new Promise<void>((resolve) => {
    server.close((error) => {
      if (error) {
        console.error("Error while closing HTTP server:", error);
      }
      resolve();
    });
  });

  console.log("Waiting for in-flight uploads to finish");
  await uploadScheduler.drain();

  if (mongo) {
    await mongo.close();
  }
}
