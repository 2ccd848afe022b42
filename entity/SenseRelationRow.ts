import { Entity, PrimaryGeneratedColumn, Column, ManyToOne, JoinColumn } from "typeorm";
import { Meta } from "../types";
import { SenseRow } from "./SenseRow";

@Entity("sense_relations")
export class SenseRelationRow {
  @PrimaryGeneratedColumn({ name: "row_id" })
  rowId!: number;

  @Column({ type: "integer", name: "source_row_id" })
  sourceRowId!: number;

  @ManyToOne(() => SenseRow, { onDelete: "CASCADE" })
  @JoinColumn({ name: "source_row_id" })
  source!: SenseRow;

  @Column({ type: "integer", name: "target_row_id" })
  targetRowId!: number;

  @ManyToOne(() => SenseRow, { onDelete: "CASCADE" })
  @JoinColumn({ name: "target_row_id" })
  target!: SenseRow;

  @Column({ type: "varchar" })
  type!: string;

  // Place in the source sense's relation list, shared with the other sense relation table.
  @Column({ type: "integer" })
  position!: number;

  @Column("simple-json", { nullable: true })
  metadata!: Meta | null;
}
