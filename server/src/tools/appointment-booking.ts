/**
 * Appointment Booking Tool
 *
 * Mock scheduler: validates the request and confirms it without contacting
 * a calendar. Bookings live on the tool instance, so each session sees only its own.
 */

import { stringArg, type Tool, type ToolArguments, type ToolParameterSchema, type ToolResult } from './types.js';

export interface Appointment {
  appointment_id: string;
  customer_name: string;
  date: string;
  time: string;
  service_type: string;
  phone: string;
  status: 'confirmed';
}

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const TIME_PATTERN = /^(\d{2}):(\d{2})$/;

function isValidDate(value: string): boolean {
  const match = DATE_PATTERN.exec(value);
  if (!match) return false;
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  // Date.UTC rolls invalid days over (Feb 30 -> Mar 2), so compare the parts back
  const date = new Date(Date.UTC(year, month - 1, day));
  return date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day;
}

function isValidTime(value: string): boolean {
  const match = TIME_PATTERN.exec(value);
  if (!match) return false;
  return Number(match[1]) < 24 && Number(match[2]) < 60;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Local-time stamp in yyyymmddHHMMSS form
 */
export function formatAppointmentStamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export class AppointmentBookingTool implements Tool {
  readonly name = 'book_appointment';
  readonly description =
    'Books an appointment for the customer. ' +
    'Use this when the caller wants to schedule a meeting, consultation, or service.';
  readonly parameters: ToolParameterSchema = {
    type: 'object',
    properties: {
      customer_name: { type: 'string', description: "The customer's full name" },
      date: { type: 'string', description: 'Appointment date in YYYY-MM-DD format' },
      time: { type: 'string', description: 'Appointment time in HH:MM format (24-hour)' },
      service_type: {
        type: 'string',
        description: 'Type of service or meeting (e.g., consultation, support, demo)',
      },
      phone: { type: 'string', description: "Customer's phone number" },
    },
    required: ['customer_name', 'date', 'time', 'service_type'],
  };

  private booked: Appointment[] = [];

  constructor(private readonly now: () => Date = () => new Date()) {}

  get bookedAppointments(): Appointment[] {
    return this.booked.map((appointment) => ({ ...appointment }));
  }

  async execute(args: ToolArguments): Promise<ToolResult> {
    const customerName = stringArg(args, 'customer_name');
    const date = stringArg(args, 'date');
    const time = stringArg(args, 'time');
    const serviceType = stringArg(args, 'service_type');
    const phone = stringArg(args, 'phone') ?? 'Not provided';

    if (!customerName || !date || !time || !serviceType) {
      return { success: false, message: 'Missing required fields for appointment booking' };
    }

    if (!isValidDate(date) || !isValidTime(time)) {
      return {
        success: false,
        message: 'Invalid date or time format. Use YYYY-MM-DD for date and HH:MM for time.',
      };
    }

    const appointment: Appointment = {
      appointment_id: `APT-${formatAppointmentStamp(this.now())}`,
      customer_name: customerName,
      date,
      time,
      service_type: serviceType,
      phone,
      status: 'confirmed',
    };

    this.booked.push(appointment);
    console.log(`[Tools] Appointment booked: ${appointment.appointment_id} for ${customerName}`);

    return {
      success: true,
      message: `Appointment successfully booked for ${customerName} on ${date} at ${time}`,
      appointment_id: appointment.appointment_id,
      details: { ...appointment },
    };
  }
}
