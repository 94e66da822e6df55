// Prints how sample inbound bodies are classified and the TwiML sent back.
// Usage: npx ts-node test-scripts/manual/print_command_replies.ts "Program name" [body...]
import { classifyCommand } from "../../src/consentTwilio/domain/commandClassifier";
import { buildReplyText, buildTwimlReply } from "../../src/consentTwilio/domain/replyFormatting";

const [programName = "our WhatsApp list", ...bodies] = process.argv.slice(2);
const samples = bodies.length > 0 ? bodies : ["STOP", " baja ", "Start", "sí", "Hola, ¿tienen mesa?"];

for (const body of samples) {
  const command = classifyCommand(body);
  console.log(`${JSON.stringify(body)} -> ${command}`);
  console.log(`  ${buildTwimlReply(buildReplyText(command, programName))}`);
}
