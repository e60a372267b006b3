import { createInterface } from "node:readline/promises";
import { cancel as clackCancel, confirm as clackConfirm, isCancel } from "@clack/prompts";

export interface PromptConfirmOptions {
  message: string;
  initialValue?: boolean;
}

export interface CliPrompter {
  confirm(options: PromptConfirmOptions): Promise<boolean>;
}

export class PromptCancelledError extends Error {
  public constructor(message = "Prompt cancelled.") {
    super(message);
    this.name = "PromptCancelledError";
  }
}

interface CliPrompterParams {
  stdin: NodeJS.ReadableStream;
  stdout: NodeJS.WritableStream;
}

export function createCliPrompter(params: CliPrompterParams): CliPrompter {
  if (isTty(params.stdin) && isTty(params.stdout)) {
    return createClackPrompter();
  }

  return createReadlinePrompter(params);
}

function createClackPrompter(): CliPrompter {
  return {
    async confirm(options: PromptConfirmOptions): Promise<boolean> {
      const value = await clackConfirm({
        message: options.message,
        initialValue: options.initialValue
      });

      if (isCancel(value)) {
        clackCancel("Cancelled.");
        throw new PromptCancelledError();
      }
      return value;
    }
  };
}

function createReadlinePrompter(params: CliPrompterParams): CliPrompter {
  return {
    async confirm(options: PromptConfirmOptions): Promise<boolean> {
      const rl = createInterface({
        input: params.stdin,
        output: params.stdout
      });

      try {
        const defaultToken = options.initialValue ? "Y/n" : "y/N";
        const answer = (await rl.question(`${options.message} [${defaultToken}]: `)).trim().toLowerCase();
        if (!answer) {
          return Boolean(options.initialValue);
        }

        return answer === "y" || answer === "yes";
      } finally {
        rl.close();
      }
    }
  };
}

function isTty(stream: NodeJS.ReadableStream | NodeJS.WritableStream): boolean {
  return "isTTY" in stream && stream.isTTY === true;
}
