import { ScanProfileSchema } from '../schemas/scanner.js';
import type { ScanProfile } from '../types/scanner.js';

// Port profiles for named scans
export const PORT_PROFILES: Record<ScanProfile, readonly number[]> = {
  // Quick scan - most common ports
  quick: [21, 22, 25, 53, 80, 443, 3389, 8080],

  // Web servers and proxies
  web: [80, 443, 3000, 5000, 8000, 8008, 8080, 8443, 8888, 9000],

  // Standard scan - common services
  standard: [
    // FTP, SSH, Telnet
    21, 22, 23,
    // Mail
    25, 110, 143, 465, 587, 993, 995,
    // DNS
    53,
    // Web
    80, 443, 8000, 8080, 8443,
    // Windows
    135, 139, 445, 3389,
    // Databases
    1433, 3306, 5432, 6379, 27017,
    // Other common
    1080, 5900,
  ],

  // Full scan - comprehensive list
  full: [
    // FTP
    20, 21,
    // SSH
    22, 2222,
    // Telnet
    23,
    // SMTP
    25, 465, 587,
    // DNS
    53,
    // HTTP/HTTPS
    80, 443, 8080, 8443, 8000, 8008, 8888, 3000, 3001, 4000, 5000, 5001, 9000,
    // POP3
    110, 995,
    // IMAP
    143, 993,
    // LDAP
    389, 636,
    // SMB
    139, 445,
    // Databases
    1433, 1521, 3306, 5432, 6379, 9042, 11211, 27017,
    // Message brokers
    1883, 5672, 9092,
    // Elasticsearch
    9200, 9300,
    // VNC
    5900, 5901,
    // RDP
    3389,
    // Docker
    2375, 2376,
    // Kubernetes
    6443, 10250,
    // SOCKS / proxies
    1080, 3128, 9050,
  ],
};

export function getPortsForProfile(profile: ScanProfile): number[] {
  return [...PORT_PROFILES[profile]];
}

export function isValidProfile(profile: string): profile is ScanProfile {
  return ScanProfileSchema.safeParse(profile).success;
}

export function getAvailableProfiles(): ScanProfile[] {
  return [...ScanProfileSchema.options];
}
