import nodemailer from "nodemailer";
import { config } from "../config.js";
import type { TriggeredTarget } from "../types.js";
import { formatTargetHit, formatTargetHitShort } from "./message-format.js";

let transporter: nodemailer.Transporter | null = null;

function getTransporter(): nodemailer.Transporter {
  if (!transporter) {
    transporter = nodemailer.createTransport({
      host: config.smtp.host,
      port: config.smtp.port,
      secure: config.smtp.port === 465,
      auth: {
        user: config.smtp.user,
        pass: config.smtp.pass,
      },
    });
  }
  return transporter;
}

export async function sendEmailAlert(triggered: TriggeredTarget): Promise<void> {
  const text = [
    `User: ${triggered.userId}`,
    ``,
    formatTargetHit(triggered).replace(/\*/g, ""),
  ].join("\n");

  await getTransporter().sendMail({
    from: config.smtp.user,
    to: config.notifyEmail,
    subject: formatTargetHitShort(triggered),
    text,
  });
}
