// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { createConnection, type Socket } from "node:net";
import { AbortError } from "./timers.js";
import type { ConnectionFactory, SubscriberConnection } from "./types.js";

/**
 * Default connection factory: plain TCP through `node:net`.
 */
export const connectTcp: ConnectionFactory = (address, { signal }) => {
  if (signal.aborted) {
    return Promise.reject(new AbortError());
  }

  return new Promise((resolve, reject) => {
    const socket = createConnection({ host: address.host, port: address.port });

    const cleanup = () => {
      socket.off("connect", onConnect);
      socket.off("error", onError);
      signal.removeEventListener("abort", onAbort);
    };
    const onConnect = () => {
      cleanup();
      resolve(wrapSocket(socket));
    };
    const onError = (error: Error) => {
      cleanup();
      socket.destroy();
      reject(error);
    };
    const onAbort = () => {
      cleanup();
      socket.destroy();
      reject(new AbortError());
    };

    socket.once("connect", onConnect);
    socket.once("error", onError);
    signal.addEventListener("abort", onAbort, { once: true });
  });
};

function wrapSocket(socket: Socket): SubscriberConnection {
  // Read errors reach the reader through `incoming`; this keeps the last one
  // around for writes attempted after the socket went down.
  let socketError: Error | undefined;
  socket.on("error", (error) => {
    socketError = error;
  });
  socket.setNoDelay(true);

  return {
    incoming: socket,

    write(data) {
      if (socket.destroyed) {
        return Promise.reject(socketError ?? new Error("Socket is closed"));
      }
      return new Promise((resolve, reject) => {
        socket.write(data, "utf8", (error) => {
          if (error) {
            reject(error);
          } else {
            resolve();
          }
        });
      });
    },

    close() {
      socket.destroy();
    },
  };
}
