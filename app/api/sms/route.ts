import { handleSms } from "@/lib/handlers/sms";
import { getServerContext } from "@/lib/server-context";

/** Webhook for the SMS provider / SNS subscription. */
export async function POST(req: Request) {
  return handleSms(req, getServerContext());
}
