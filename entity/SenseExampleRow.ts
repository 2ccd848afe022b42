import { Entity, PrimaryGeneratedColumn, Column, ManyToOne, JoinColumn } from "typeorm";
import { Meta } from "../types";
import { SenseRow } from "./SenseRow";

@Entity("sense_examples")
export class SenseExampleRow {
  @PrimaryGeneratedColumn({ name: "row_id" })
  rowId!: number;

  @Column({ type: "integer", name: "sense_row_id" })
  senseRowId!: number;

  @ManyToOne(() => SenseRow, { onDelete: "CASCADE" })
  @JoinColumn({ name: "sense_row_id" })
  sense!: SenseRow;

  @Column({ type: "text" })
  example!: string;

  @Column({ type: "varchar", nullable: true })
  language!: string | null;

  @Column("simple-json", { nullable: true })
  metadata!: Meta | null;
}
